
export const REMOTE_OUTCOMES = [
    "Passed",
    "Failed",
    "Blocked",
    "NotApplicable",
    "Inconclusive",
    "Timeout",
    "Aborted",
    "None",
] as const;

export type RemoteOutcome = (typeof REMOTE_OUTCOMES)[number];

export type TestPoint = {
    readonly pointId: number;
    readonly suiteId: number;
    readonly planId: number;
    readonly testCaseId?: number;
    readonly testCaseName: string;
    readonly currentOutcome: string;
    readonly automated: boolean;
    readonly state: string;
    readonly configurationName: string;
    readonly assignedTo: string;
    readonly details?: TestCaseDetails;
};

export type SuiteInfo = {
    id: number;
    name: string;
    type: string;
    parentSuiteId?: number;
};

export type SuitePoints = {
    suite: SuiteInfo;
    points: TestPoint[];
};

export type TestStep = {
    id: string;
    action: string;
    expected: string;
};

export type TestCaseDetails = {
    id: number;
    title: string;
    state: string;
    priority: string;
    automationStatus: string;
    assignedTo: string;
    steps: TestStep[];
    url?: string;
};

export interface ITestPointService {
    listTestPoints(planId: number, suiteId?: number): Promise<SuitePoints[]>;
    updateTestPoint(
        planId: number,
        suiteId: number,
        pointId: number,
        outcome: RemoteOutcome,
        comment?: string
    ): Promise<void>;
    getTestCaseDetails(testCaseId: number): Promise<TestCaseDetails>;
    withDetails(suites: SuitePoints[]): Promise<SuitePoints[]>;
}
