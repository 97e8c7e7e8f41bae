import {
  ITestPointService,
  RemoteOutcome,
  SuitePoints,
  TestCaseDetails,
} from "./interfaces/ITestPointService";

/**
 * Defers opening the connection until the first request, so commands that
 * fail on local input never reach the service.
 */
export class LazyTestPointService implements ITestPointService {
  private service?: Promise<ITestPointService>;

  constructor(private connect: () => Promise<ITestPointService>) { }

  async listTestPoints(planId: number, suiteId?: number): Promise<SuitePoints[]> {
    return (await this.resolve()).listTestPoints(planId, suiteId);
  }

  async updateTestPoint(
    planId: number,
    suiteId: number,
    pointId: number,
    outcome: RemoteOutcome,
    comment?: string
  ): Promise<void> {
    return (await this.resolve()).updateTestPoint(planId, suiteId, pointId, outcome, comment);
  }

  async getTestCaseDetails(testCaseId: number): Promise<TestCaseDetails> {
    return (await this.resolve()).getTestCaseDetails(testCaseId);
  }

  async withDetails(suites: SuitePoints[]): Promise<SuitePoints[]> {
    return (await this.resolve()).withDetails(suites);
  }

  private resolve(): Promise<ITestPointService> {
    this.service ??= this.connect();
    return this.service;
  }
}
