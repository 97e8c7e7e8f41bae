import { TestOutcome } from "./ITestResultParser";
import { RemoteOutcome, TestPoint } from "./ITestPointService";
import { PointFilterCriteria } from "./PointFilterCriteria";

export type MatchStrategy = "Exact" | "Partial" | "TokenSort";

export type MatchCandidate = {
    testPoint: TestPoint;
    score: number;
    strategy: MatchStrategy;
};

export type UpdatePlanItem = {
    pointId: number;
    suiteId: number;
    planId: number;
    targetOutcome: RemoteOutcome;
    comment?: string;
    /** Absent when the item comes from a criteria update rather than a match. */
    source?: TestOutcome;
    matchScore?: number;
};

export type ReconcileOptions = {
    minScore?: number;
    filter?: PointFilterCriteria;
    comment?: string;
};

export type ReconcileResult = {
    plan: UpdatePlanItem[];
    unmatched: number;
    unmatchedOutcomes: TestOutcome[];
};
