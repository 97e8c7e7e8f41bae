import { ITestApi } from "azure-devops-node-api/TestApi";
import { ITestPlanApi } from "azure-devops-node-api/TestPlanApi";
import { IWorkItemTrackingApi } from "azure-devops-node-api/WorkItemTrackingApi";
import {
  PointUpdateModel,
  TestPoint as AdoTestPoint,
} from "azure-devops-node-api/interfaces/TestInterfaces";
import { TestSuiteType } from "azure-devops-node-api/interfaces/TestPlanInterfaces";
import { WorkItemExpand } from "azure-devops-node-api/interfaces/WorkItemTrackingInterfaces";
import * as xml2js from "xml2js";
import {
  ITestPointService,
  RemoteOutcome,
  SuiteInfo,
  SuitePoints,
  TestCaseDetails,
  TestPoint,
  TestStep,
} from "./interfaces/ITestPointService";
import { ILogger } from "./interfaces/ILogger";
import { NotFoundError } from "./errors";
import { classifyServiceError } from "./utils/ServiceErrors";

const PAGE_SIZE = 200;
const STEPS_FIELD = "Microsoft.VSTS.TCM.Steps";

function parseId(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const id = typeof value === "number" ? value : parseInt(value, 10);
  return isNaN(id) ? undefined : id;
}

function fieldText(fields: Record<string, unknown> | undefined, key: string, fallback: string): string {
  const value = fields?.[key];
  if (typeof value === "string" && value) return value;
  if (typeof value === "number") return String(value);
  return fallback;
}

function identityName(fields: Record<string, unknown> | undefined, key: string, fallback: string): string {
  const value = fields?.[key];
  if (typeof value === "object" && value !== null && "displayName" in value && typeof value.displayName === "string") {
    return value.displayName;
  }
  return typeof value === "string" && value ? value : fallback;
}

function stripHtml(value: string): string {
  return value
    .replace(/<[^>]*>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

function textOf(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "object" && node !== null && "_" in node && typeof node._ === "string") {
    return node._;
  }
  return "";
}

/**
 * Reads the steps XML stored on a test case work item
 * (`<steps><step id type><parameterizedString/>...</step></steps>`).
 */
export async function parseSteps(stepsXml: string): Promise<TestStep[]> {
  if (!stepsXml.trim()) return [];

  const parsed: unknown = await new xml2js.Parser().parseStringPromise(stepsXml);
  if (typeof parsed !== "object" || parsed === null || !("steps" in parsed)) return [];

  const root = parsed.steps;
  if (typeof root !== "object" || root === null || !("step" in root) || !Array.isArray(root.step)) {
    return [];
  }

  return root.step.map((step: unknown): TestStep => {
    if (typeof step !== "object" || step === null) {
      return { id: "", action: "", expected: "" };
    }
    const attrs: object = "$" in step && typeof step.$ === "object" && step.$ !== null ? step.$ : {};
    const id = "id" in attrs && typeof attrs.id === "string" ? attrs.id : "";
    const strings =
      "parameterizedString" in step && Array.isArray(step.parameterizedString)
        ? step.parameterizedString
        : [];
    return {
      id,
      action: stripHtml(textOf(strings[0])),
      expected: stripHtml(textOf(strings[1])),
    };
  });
}

export class TestPointService implements ITestPointService {
  constructor(
    private testApi: ITestApi,
    private testPlanApi: ITestPlanApi,
    private workItemApi: IWorkItemTrackingApi,
    private project: string,
    private logger: ILogger
  ) { }

  async listTestPoints(planId: number, suiteId?: number): Promise<SuitePoints[]> {
    const suites: SuiteInfo[] =
      suiteId !== undefined
        ? [{ id: suiteId, name: `Suite ${suiteId}`, type: "Unknown" }]
        : await this.getSuites(planId);

    const result: SuitePoints[] = [];
    for (const suite of suites) {
      const points = await this.getPoints(planId, suite.id);
      if (points.length > 0) {
        result.push({ suite, points });
      }
    }
    return result;
  }

  async updateTestPoint(
    planId: number,
    suiteId: number,
    pointId: number,
    outcome: RemoteOutcome,
    comment?: string
  ): Promise<void> {
    const model: PointUpdateModel & { comment?: string } = comment
      ? { outcome, comment }
      : { outcome };

    try {
      const updated = await this.testApi.updateTestPoints(
        model,
        this.project,
        planId,
        suiteId,
        String(pointId)
      );
      // A 404 also resolves to null here.
      if (!updated || updated.length === 0) {
        throw new NotFoundError(`Error updating point ${pointId}: point not found`);
      }
    } catch (e) {
      throw classifyServiceError(e, `Error updating point ${pointId}`);
    }
  }

  async getTestCaseDetails(testCaseId: number): Promise<TestCaseDetails> {
    try {
      const workItem = await this.workItemApi.getWorkItem(
        testCaseId,
        undefined,
        undefined,
        WorkItemExpand.All,
        this.project
      );
      const fields: Record<string, unknown> | undefined = workItem?.fields;
      const links: unknown = workItem?._links;

      return {
        id: workItem?.id ?? testCaseId,
        title: fieldText(fields, "System.Title", "Unknown"),
        state: fieldText(fields, "System.State", "Unknown"),
        priority: fieldText(fields, "Microsoft.VSTS.Common.Priority", "Unknown"),
        automationStatus: fieldText(fields, "Microsoft.VSTS.TCM.AutomationStatus", "Not Automated"),
        assignedTo: identityName(fields, "System.AssignedTo", "Unassigned"),
        steps: await parseSteps(fieldText(fields, STEPS_FIELD, "")),
        url: this.htmlLink(links),
      };
    } catch (e) {
      this.logger.warn(`⚠️ Unable to fetch details for Test Case ${testCaseId}:`, e);
      return {
        id: testCaseId,
        title: "Unable to fetch details",
        state: "Unknown",
        priority: "Unknown",
        automationStatus: "Not Automated",
        assignedTo: "Unassigned",
        steps: [],
      };
    }
  }

  async withDetails(suites: SuitePoints[]): Promise<SuitePoints[]> {
    const enriched: SuitePoints[] = [];
    for (const { suite, points } of suites) {
      const detailed = await Promise.all(
        points.map(async (point) =>
          point.testCaseId === undefined
            ? point
            : { ...point, details: await this.getTestCaseDetails(point.testCaseId) }
        )
      );
      enriched.push({ suite, points: detailed });
    }
    return enriched;
  }

  private async getSuites(planId: number): Promise<SuiteInfo[]> {
    try {
      const suites = await this.testPlanApi.getTestSuitesForPlan(this.project, planId);
      if (!suites) {
        throw new NotFoundError(`Test Plan ${planId} not found`);
      }
      return suites.flatMap((s): SuiteInfo[] =>
        s.id === undefined
          ? []
          : [{
              id: s.id,
              name: s.name ?? `Suite ${s.id}`,
              type: s.suiteType !== undefined ? TestSuiteType[s.suiteType] : "Unknown",
              parentSuiteId: s.parentSuite?.id,
            }]
      );
    } catch (e) {
      throw classifyServiceError(e, `Error fetching test suites for plan ${planId}`);
    }
  }

  private async getPoints(planId: number, suiteId: number): Promise<TestPoint[]> {
    const raw: AdoTestPoint[] = [];
    try {
      for (let skip = 0; ; skip += PAGE_SIZE) {
        const page = await this.testApi.getPoints(
          this.project,
          planId,
          suiteId,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          skip,
          PAGE_SIZE
        );
        // The REST client resolves a 404 to null instead of throwing.
        if (!page) {
          throw new NotFoundError(`Suite ${suiteId} not found in plan ${planId}`);
        }
        raw.push(...page);
        if (page.length < PAGE_SIZE) break;
      }
    } catch (e) {
      throw classifyServiceError(e, `Error fetching test points for suite ${suiteId}`);
    }

    return raw.flatMap((pt) => this.toTestPoint(pt, planId, suiteId));
  }

  private toTestPoint(pt: AdoTestPoint, planId: number, suiteId: number): TestPoint[] {
    if (pt.id === undefined) return [];
    return [{
      pointId: pt.id,
      suiteId: parseId(pt.suite?.id) ?? suiteId,
      planId: parseId(pt.testPlan?.id) ?? planId,
      testCaseId: parseId(pt.testCase?.id),
      testCaseName: pt.testCase?.name ?? "Unknown",
      currentOutcome: pt.outcome || "Unspecified",
      automated: pt.automated ?? false,
      state: pt.state || "Unknown",
      configurationName: pt.configuration?.name ?? "Default",
      assignedTo: pt.assignedTo?.displayName ?? "Unassigned",
    }];
  }

  private htmlLink(links: unknown): string | undefined {
    if (typeof links !== "object" || links === null || !("html" in links)) return undefined;
    const html = links.html;
    if (typeof html === "object" && html !== null && "href" in html && typeof html.href === "string") {
      return html.href;
    }
    return undefined;
  }
}
