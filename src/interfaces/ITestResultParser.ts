
export type TestStatus = "Passed" | "Failed" | "Error" | "Skipped";

export type TestOutcome = {
    readonly name: string;
    readonly className: string;
    readonly durationMs: number;
    readonly status: TestStatus;
    readonly failureMessage?: string;
};

export interface ITestResultParser {
    parse(filePath: string): Promise<TestOutcome[]>;
    parseFiles(filePaths: string[]): Promise<TestOutcome[]>;
}
