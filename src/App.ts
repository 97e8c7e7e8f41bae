import { ITestPointService, SuitePoints, TestPoint } from "./interfaces/ITestPointService";
import { ITestResultParser } from "./interfaces/ITestResultParser";
import { ILogger } from "./interfaces/ILogger";
import { RunSummary } from "./interfaces/IBulkUpdate";
import { UpdatePlanItem } from "./interfaces/IReconciliation";
import { CriteriaUpdateOptions, ListOptions, SyncOptions } from "./interfaces/RunOptions";
import { ReconciliationEngine } from "./ReconciliationEngine";
import { BulkUpdateOrchestrator } from "./BulkUpdateOrchestrator";
import { OutputWriter } from "./OutputWriter";
import { describeCriteria, filterPoints } from "./PointFilter";

const RULE = "=".repeat(80);

function flatten(suites: SuitePoints[]): TestPoint[] {
    return suites.flatMap((s) => s.points);
}

export class App {
    constructor(
        private testPointService: ITestPointService,
        private parser: ITestResultParser,
        private engine: ReconciliationEngine,
        private orchestrator: BulkUpdateOrchestrator,
        private output: OutputWriter,
        private logger: ILogger
    ) { }

    async list(options: ListOptions): Promise<SuitePoints[]> {
        let suites = await this.testPointService.listTestPoints(options.planId, options.suiteId);
        if (options.detailed) {
            this.logger.log("🔎 Fetching test case details...");
            suites = await this.testPointService.withDetails(suites);
        }

        switch (options.output) {
            case "json":
                this.output.saveJson(suites, options.planId);
                break;
            case "csv":
                this.output.saveCsv(suites, options.planId);
                break;
            default:
                this.output.printListing(suites, options.detailed);
        }
        return suites;
    }

    async updateByCriteria(options: CriteriaUpdateOptions): Promise<RunSummary> {
        const { planId, suiteId, outcome, dryRun } = options;
        this.logger.log(`\n${RULE}\n${dryRun ? "DRY RUN - " : ""}UPDATING TEST POINTS\n${RULE}`);
        this.logger.log(`Plan ID: ${planId}`);
        this.logger.log(`Suite ID: ${suiteId ?? "All suites"}`);
        this.logger.log(`Target Outcome: ${outcome}`);
        this.logger.log(`Filter Criteria: ${describeCriteria(options.filter)}`);

        const suites = await this.testPointService.listTestPoints(planId, suiteId);
        const plan: UpdatePlanItem[] = [];

        for (const { suite, points } of suites) {
            const eligible = filterPoints(points, options.filter);
            if (eligible.length === 0) continue;
            this.logger.log(`\nSuite: ${suite.name} (ID: ${suite.id})`);
            this.logger.log(`  Eligible points: ${eligible.length}/${points.length}`);
            for (const point of eligible) {
                plan.push({
                    pointId: point.pointId,
                    suiteId: point.suiteId,
                    planId: point.planId,
                    targetOutcome: outcome,
                    comment: options.comment,
                });
            }
        }

        const found = flatten(suites).length;
        this.logger.log(`\n📋 ${plan.length} of ${found} test points eligible for update.`);

        const summary = await this.orchestrator.execute(plan, {
            dryRun,
            concurrency: options.concurrency,
        });
        this.output.printUpdateSummary(summary, dryRun);
        return summary;
    }

    /**
     * Parses the result files first, so a broken file stops the run before the
     * service is contacted, then fetches the snapshot, plans and applies.
     */
    async syncFromResults(options: SyncOptions): Promise<RunSummary> {
        const { planId, suiteId, dryRun } = options;

        const outcomes = await this.parser.parseFiles(options.resultFiles);
        this.logger.log(
            `🧪 Parsed ${outcomes.length} test results from ${options.resultFiles.length} file(s).`
        );

        this.logger.log(`\n${RULE}\n${dryRun ? "DRY RUN - " : ""}UPDATING FROM TEST RESULTS\n${RULE}`);
        this.logger.log(`Plan ID: ${planId}`);
        this.logger.log(`Suite ID: ${suiteId ?? "All suites"}`);
        this.logger.log(`Min Score: ${options.minScore}`);

        const points = flatten(await this.testPointService.listTestPoints(planId, suiteId));
        this.logger.log(`📌 Fetched ${points.length} test points.`);
        if (points.length === 0) {
            this.logger.warn("⚠️ No test points found in the selected plan/suite; nothing can be matched.");
        }

        const { plan, unmatched, unmatchedOutcomes } = this.engine.reconcile(outcomes, points, {
            minScore: options.minScore,
            filter: options.filter,
            comment: options.comment,
        });

        for (const item of plan) {
            this.logger.log(
                `🔍 Result mapping: ${item.source?.name} -> Point ${item.pointId} (score ${item.matchScore}, ${item.targetOutcome})`
            );
        }
        for (const outcome of unmatchedOutcomes) {
            this.logger.warn(`⚠️ No test point matched "${outcome.name}" (min score ${options.minScore}).`);
        }
        this.logger.log(`✅ Matched ${plan.length} of ${outcomes.length} results; ${unmatched} unmatched.`);

        const summary = await this.orchestrator.execute(plan, {
            dryRun,
            concurrency: options.concurrency,
            unmatched,
        });
        this.output.printUpdateSummary(summary, dryRun);
        return summary;
    }
}
