import { ITestPointService } from "./interfaces/ITestPointService";
import { ILogger } from "./interfaces/ILogger";
import { UpdatePlanItem } from "./interfaces/IReconciliation";
import { ExecuteOptions, RunSummary, UpdateResult } from "./interfaces/IBulkUpdate";
import { ServiceUnavailableError } from "./errors";

export class BulkUpdateOrchestrator {
  constructor(
    private testPointService: ITestPointService,
    private logger: ILogger
  ) { }

  /**
   * Applies the plan item by item. A failure on one point is recorded and the
   * batch moves on; a ServiceUnavailableError stops new items from starting
   * and is rethrown once the in-flight ones settle. Nothing is rolled back.
   */
  async execute(plan: readonly UpdatePlanItem[], options: ExecuteOptions): Promise<RunSummary> {
    const { dryRun } = options;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

    // One slot per plan item, each written exactly once.
    const slots: (UpdateResult | undefined)[] = plan.map(() => undefined);
    let next = 0;
    const abort: { error?: ServiceUnavailableError } = {};

    const worker = async (): Promise<void> => {
      while (!abort.error && next < plan.length) {
        const index = next++;
        const item = plan[index];
        try {
          slots[index] = await this.applyItem(item, dryRun);
        } catch (e) {
          if (!(e instanceof ServiceUnavailableError)) throw e;
          abort.error ??= e;
        }
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(concurrency, plan.length) }, () => worker())
    );

    const results = slots.filter((slot): slot is UpdateResult => slot !== undefined);

    if (abort.error) {
      this.logger.error(
        `🛑 Service unavailable; aborted after ${results.length} of ${plan.length} updates.`,
        abort.error
      );
      throw abort.error;
    }

    return this.summarize(plan, results, options.unmatched ?? 0);
  }

  private async applyItem(item: UpdatePlanItem, dryRun: boolean): Promise<UpdateResult> {
    if (dryRun) {
      this.logger.log(`    [DRY RUN] Point ${item.pointId} -> ${item.targetOutcome}`);
      return { pointId: item.pointId, success: true, simulated: true };
    }

    try {
      await this.testPointService.updateTestPoint(
        item.planId,
        item.suiteId,
        item.pointId,
        item.targetOutcome,
        item.comment
      );
      this.logger.log(`    ✓ Updated point ${item.pointId} -> ${item.targetOutcome}`);
      return { pointId: item.pointId, success: true, simulated: false };
    } catch (e) {
      if (e instanceof ServiceUnavailableError) throw e;
      const error = e instanceof Error ? e.message : String(e);
      this.logger.warn(`    ✗ Failed to update point ${item.pointId}:`, error);
      return { pointId: item.pointId, success: false, simulated: false, error };
    }
  }

  private summarize(
    plan: readonly UpdatePlanItem[],
    results: UpdateResult[],
    unmatched: number
  ): RunSummary {
    const byOutcome: Record<string, number> = {};
    let totalUpdated = 0;

    results.forEach((result, index) => {
      if (!result.success) return;
      totalUpdated++;
      const outcome = plan[index].targetOutcome;
      byOutcome[outcome] = (byOutcome[outcome] ?? 0) + 1;
    });

    return {
      totalAttempted: results.length,
      totalUpdated,
      totalFailed: results.length - totalUpdated,
      totalUnmatched: unmatched,
      byOutcome,
      results,
    };
  }
}
