import { OutputFormat } from "./IConfigService";
import { PointFilterCriteria } from "./PointFilterCriteria";
import { RemoteOutcome } from "./ITestPointService";

export interface ListOptions {
    planId: number;
    suiteId?: number;
    detailed: boolean;
    output: OutputFormat;
}

export interface CriteriaUpdateOptions {
    planId: number;
    suiteId?: number;
    outcome: RemoteOutcome;
    filter?: PointFilterCriteria;
    comment?: string;
    dryRun: boolean;
    concurrency: number;
}

export interface SyncOptions {
    planId: number;
    suiteId?: number;
    resultFiles: string[];
    minScore: number;
    filter?: PointFilterCriteria;
    comment?: string;
    dryRun: boolean;
    concurrency: number;
}
