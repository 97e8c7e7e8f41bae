import { ILogger } from "../src/interfaces/ILogger";
import {
    ITestPointService,
    RemoteOutcome,
    SuitePoints,
    TestCaseDetails,
    TestPoint,
} from "../src/interfaces/ITestPointService";
import { TestOutcome } from "../src/interfaces/ITestResultParser";

export class MockLogger implements ILogger {
    public messages: string[] = [];
    public warnings: string[] = [];
    public errors: string[] = [];

    log(message: string): void { this.messages.push(message); }
    warn(message: string): void { this.warnings.push(message); }
    error(message: string): void { this.errors.push(message); }
}

export function makePoint(overrides: Partial<TestPoint> & { pointId: number; testCaseName: string }): TestPoint {
    return {
        suiteId: 7,
        planId: 3,
        testCaseId: overrides.pointId + 400,
        currentOutcome: "Unspecified",
        automated: true,
        state: "Ready",
        configurationName: "Windows",
        assignedTo: "QA Bot",
        ...overrides,
    };
}

export function makeOutcome(name: string, status: TestOutcome["status"] = "Passed"): TestOutcome {
    return { name, className: "tests.sample", durationMs: 10, status };
}

export type RecordedUpdate = {
    planId: number;
    suiteId: number;
    pointId: number;
    outcome: RemoteOutcome;
    comment?: string;
};

export class FakeTestPointService implements ITestPointService {
    public updates: RecordedUpdate[] = [];
    public listCalls = 0;
    public failures = new Map<number, Error>();
    public delays = new Map<number, number>();
    public inFlight = 0;
    public maxInFlight = 0;

    constructor(private suites: SuitePoints[] = []) { }

    async listTestPoints(): Promise<SuitePoints[]> {
        this.listCalls++;
        return this.suites;
    }

    async updateTestPoint(
        planId: number,
        suiteId: number,
        pointId: number,
        outcome: RemoteOutcome,
        comment?: string
    ): Promise<void> {
        this.updates.push({ planId, suiteId, pointId, outcome, comment });
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            const delay = this.delays.get(pointId);
            if (delay) {
                await new Promise((resolve) => setTimeout(resolve, delay));
            }
            const failure = this.failures.get(pointId);
            if (failure) throw failure;
        } finally {
            this.inFlight--;
        }
    }

    async getTestCaseDetails(testCaseId: number): Promise<TestCaseDetails> {
        return {
            id: testCaseId,
            title: `Case ${testCaseId}`,
            state: "Ready",
            priority: "2",
            automationStatus: "Automated",
            assignedTo: "QA Bot",
            steps: [],
        };
    }

    async withDetails(suites: SuitePoints[]): Promise<SuitePoints[]> {
        return suites;
    }
}
