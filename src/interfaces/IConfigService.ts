import { RemoteOutcome } from "./ITestPointService";

export type AuthType = "pat" | "bearer";

export type AppEnv = {
    token: string;
    /** Pipeline job tokens are bearer tokens; personal access tokens use basic auth. */
    authType: AuthType;
    orgUrl: string;
    project: string;
};

export type OutputFormat = "console" | "json" | "csv";

export type SyncArgs = {
    planId?: number;
    suiteId?: number;
    detailed: boolean;
    output: OutputFormat;
    updateOutcome?: RemoteOutcome;
    comment?: string;
    dryRun: boolean;
    filterOutcome?: string;
    filterAutomated?: boolean;
    filterState?: string;
    filterName?: string;
    fromXml?: string;
    minScore: number;
    concurrency: number;
    showConfig: boolean;
};

/** Raw values as they come out of the argument parser. */
export type RawArgs = {
    planId?: number;
    suiteId?: number;
    detailed?: boolean;
    output?: string;
    updateOutcome?: string;
    comment?: string;
    dryRun?: boolean;
    filterOutcome?: string;
    filterAutomated?: boolean;
    filterState?: string;
    filterName?: string;
    fromXml?: string;
    minScore?: number;
    concurrency?: number;
    showConfig?: boolean;
};

export interface IConfigService {
    loadEnvironment(): AppEnv;
    loadArgs(argv: RawArgs): SyncArgs;
}
