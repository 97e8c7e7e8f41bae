import * as fs from "fs";
import * as path from "path";
import { ILogger } from "./interfaces/ILogger";
import { SuitePoints, TestPoint } from "./interfaces/ITestPointService";
import { RunSummary } from "./interfaces/IBulkUpdate";
import { AppEnv } from "./interfaces/IConfigService";
import { toCsvRow } from "./utils/CsvUtils";
import { SecretRedactor } from "./utils/SecretRedactor";

const RULE = "=".repeat(80);
const PREVIEW_COUNT = 5;

const CSV_HEADER = [
  "Suite ID",
  "Suite Name",
  "Suite Type",
  "Point ID",
  "Test Case ID",
  "Test Case Name",
  "State",
  "Outcome",
  "Configuration",
  "Assigned To",
  "Automated",
  "Priority",
  "Steps Count",
];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function titleOf(point: TestPoint): string {
  return point.details?.title ?? point.testCaseName;
}

function tally(values: string[]): string {
  const counts = new Map<string, number>();
  values.forEach((v) => counts.set(v, (counts.get(v) ?? 0) + 1));
  return [...counts].map(([k, v]) => `${k}: ${v}`).join(", ");
}

export class OutputWriter {
  constructor(
    private logger: ILogger,
    private outputDir: string = process.cwd(),
    private now: () => Date = () => new Date()
  ) { }

  printConfig(env: AppEnv): void {
    this.logger.log("🔧 Current Configuration:");
    this.logger.log(`   Organization: ${env.orgUrl}`);
    this.logger.log(`   Project: ${env.project}`);
    this.logger.log(`   Token: ${env.token ? "✅ Set" : "❌ Not Set"} (${env.authType})`);
    if (env.token) {
      this.logger.log(`   Token Preview: ${SecretRedactor.mask(env.token)}`);
    }
  }

  printListing(suites: SuitePoints[], detailed: boolean): void {
    this.logger.log(`\n${RULE}\nTEST POINTS SUMMARY\n${RULE}`);

    let totalPoints = 0;
    for (const { suite, points } of suites) {
      totalPoints += points.length;
      this.logger.log(`\n📁 Suite: ${suite.name} (ID: ${suite.id})`);
      this.logger.log(`   Type: ${suite.type}`);
      this.logger.log(`   Test Points: ${points.length}`);
      if (points.length === 0) continue;

      const automated = points.filter((p) => p.automated).length;
      this.logger.log(`   Outcomes: ${tally(points.map((p) => p.currentOutcome))}`);
      this.logger.log(`   States: ${tally(points.map((p) => p.state))}`);
      this.logger.log(`   Automated: ${automated}/${points.length}`);
      this.logger.log("   Test Points:");

      points.slice(0, PREVIEW_COUNT).forEach((point, i) => {
        this.logger.log(
          `     ${i + 1}. Point ${point.pointId}: TC-${point.testCaseId ?? "?"} - ${titleOf(point).substring(0, 60)}`
        );
        this.logger.log(
          `        State: ${point.state}, Outcome: ${point.currentOutcome}, Config: ${point.configurationName}`
        );
        if (detailed && point.details) {
          this.logger.log(
            `        Priority: ${point.details.priority}, Steps: ${point.details.steps.length}`
          );
          this.logger.log(`        Automation: ${point.details.automationStatus}`);
        }
      });
      if (points.length > PREVIEW_COUNT) {
        this.logger.log(`     ... and ${points.length - PREVIEW_COUNT} more test points`);
      }
    }

    this.logger.log(`\n${RULE}\nTOTAL SUMMARY\n${RULE}`);
    this.logger.log(`Total Suites: ${suites.length}`);
    this.logger.log(`Total Test Points: ${totalPoints}`);
  }

  saveJson(suites: SuitePoints[], planId: number): string {
    const filePath = this.outputPath(planId, "json");
    fs.writeFileSync(filePath, JSON.stringify(suites, null, 2), "utf-8");
    this.logger.log(`\n💾 Results saved to: ${filePath}`);
    return filePath;
  }

  saveCsv(suites: SuitePoints[], planId: number): string {
    const rows = [toCsvRow(CSV_HEADER)];
    for (const { suite, points } of suites) {
      for (const point of points) {
        rows.push(
          toCsvRow([
            suite.id,
            suite.name,
            suite.type,
            point.pointId,
            point.testCaseId,
            titleOf(point),
            point.state,
            point.currentOutcome,
            point.configurationName,
            point.assignedTo,
            point.automated,
            point.details?.priority ?? "N/A",
            point.details?.steps.length ?? 0,
          ])
        );
      }
    }

    const filePath = this.outputPath(planId, "csv");
    fs.writeFileSync(filePath, rows.join("\n") + "\n", "utf-8");
    this.logger.log(`\n📊 CSV results saved to: ${filePath}`);
    return filePath;
  }

  printUpdateSummary(summary: RunSummary, dryRun: boolean): void {
    this.logger.log(`\n${RULE}\n${dryRun ? "DRY RUN - " : ""}UPDATE SUMMARY\n${RULE}`);
    this.logger.log(`Attempted: ${summary.totalAttempted}`);
    this.logger.log(`${dryRun ? "Would Update" : "Successfully Updated"}: ${summary.totalUpdated}`);
    this.logger.log(`Failed: ${summary.totalFailed}`);
    this.logger.log(`Unmatched: ${summary.totalUnmatched}`);

    const byOutcome = Object.entries(summary.byOutcome);
    if (byOutcome.length > 0) {
      this.logger.log(`By Outcome: ${byOutcome.map(([k, v]) => `${k}: ${v}`).join(", ")}`);
    }

    const errors = summary.results.filter((r) => !r.success);
    if (errors.length > 0) {
      this.logger.log(`Errors: ${errors.length}`);
      errors.slice(0, PREVIEW_COUNT).forEach((r) => {
        this.logger.log(`  - Point ${r.pointId}: ${r.error ?? "unknown error"}`);
      });
      if (errors.length > PREVIEW_COUNT) {
        this.logger.log(`  - ... and ${errors.length - PREVIEW_COUNT} more errors`);
      }
    }
  }

  private outputPath(planId: number, extension: string): string {
    return path.join(
      this.outputDir,
      `test_points_plan_${planId}_${fileTimestamp(this.now())}.${extension}`
    );
  }
}
