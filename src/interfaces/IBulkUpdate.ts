
export type UpdateResult = {
    pointId: number;
    success: boolean;
    simulated: boolean;
    error?: string;
};

export type RunSummary = {
    totalAttempted: number;
    totalUpdated: number;
    totalFailed: number;
    totalUnmatched: number;
    byOutcome: Record<string, number>;
    results: UpdateResult[];
};

export type ExecuteOptions = {
    dryRun: boolean;
    concurrency?: number;
    unmatched?: number;
};
