import { TestOutcome } from "./interfaces/ITestResultParser";
import { TestPoint } from "./interfaces/ITestPointService";
import {
  MatchCandidate,
  ReconcileOptions,
  ReconcileResult,
  UpdatePlanItem,
} from "./interfaces/IReconciliation";
import { normalizeTestName } from "./NameNormalizer";
import { DEFAULT_MIN_SCORE, MatchInput, match } from "./FuzzyMatcher";
import { OUTCOME_MAP } from "./OutcomeMapping";
import { matchesCriteria } from "./PointFilter";
import { renderComment } from "./utils/CommentTemplate";

/**
 * Turns parsed results plus a snapshot of test points into an update plan.
 * Results are handled in document order and each point can be claimed once;
 * a later result only competes for the points that are still free.
 *
 * Never calls the service.
 */
export class ReconciliationEngine {
  reconcile(
    outcomes: readonly TestOutcome[],
    points: readonly TestPoint[],
    options: ReconcileOptions = {}
  ): ReconcileResult {
    const minScore = options.minScore ?? DEFAULT_MIN_SCORE;

    const eligible: MatchInput<TestPoint>[] = points
      .filter((point) => matchesCriteria(point, options.filter))
      .map((point) => ({
        name: normalizeTestName(point.details?.title ?? point.testCaseName),
        value: point,
      }));

    const claimed = new Set<number>();
    const plan: UpdatePlanItem[] = [];
    const unmatchedOutcomes: TestOutcome[] = [];

    for (const outcome of outcomes) {
      const candidate = this.findCandidate(outcome, eligible, claimed, minScore);
      if (!candidate) {
        unmatchedOutcomes.push(outcome);
        continue;
      }

      const { testPoint } = candidate;
      const targetOutcome = OUTCOME_MAP[outcome.status];
      claimed.add(testPoint.pointId);

      plan.push({
        pointId: testPoint.pointId,
        suiteId: testPoint.suiteId,
        planId: testPoint.planId,
        targetOutcome,
        comment: options.comment
          ? renderComment(options.comment, {
              source: outcome,
              outcome: targetOutcome,
              score: candidate.score,
            })
          : undefined,
        source: outcome,
        matchScore: candidate.score,
      });
    }

    return { plan, unmatched: unmatchedOutcomes.length, unmatchedOutcomes };
  }

  private findCandidate(
    outcome: TestOutcome,
    eligible: MatchInput<TestPoint>[],
    claimed: Set<number>,
    minScore: number
  ): MatchCandidate | null {
    const query = normalizeTestName(outcome.name);
    if (!query) return null;

    const free = eligible.filter((entry) => !claimed.has(entry.value.pointId));
    const best = match(query, free, minScore);
    if (!best) return null;

    return { testPoint: best.value, score: best.score, strategy: best.strategy };
  }
}
