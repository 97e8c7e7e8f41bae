import yargsFactory from "yargs/yargs";
import { ConfigService } from "./config";
import { IAzureClientProvider } from "./interfaces/IAzureClientProvider";
import { ILogger } from "./interfaces/ILogger";
import { LazyTestPointService } from "./LazyTestPointService";
import { AzureClientProvider } from "./AzureClientProvider";
import { ConsoleLogger } from "./ConsoleLogger";
import { TestPointService } from "./testPointService";
import { JUnitParser } from "./junitParser";
import { ReconciliationEngine } from "./ReconciliationEngine";
import { BulkUpdateOrchestrator } from "./BulkUpdateOrchestrator";
import { OutputWriter } from "./OutputWriter";
import { App } from "./App";
import { REMOTE_OUTCOMES } from "./interfaces/ITestPointService";
import { PointFilterCriteria } from "./interfaces/PointFilterCriteria";
import { SyncArgs } from "./interfaces/IConfigService";
import { resolveResultFiles } from "./utils/ResultFiles";
import { hasCriteria } from "./PointFilter";

const EPILOG = `
Environment Variables (Required):
  AZURE_DEVOPS_PAT      Personal Access Token (or SYSTEM_ACCESSTOKEN in a pipeline)
  AZURE_DEVOPS_ORG      Organization URL, e.g. https://dev.azure.com/my-org
  AZURE_DEVOPS_PROJECT  Project name

Examples:
  test-point-sync 1234                                   List all points in plan 1234
  test-point-sync 1234 5678 --detailed                   List one suite with test case details
  test-point-sync 1234 --output csv                      Save the listing as CSV
  test-point-sync 1234 --update-outcome Passed --dry-run Preview marking every point Passed
  test-point-sync 1234 --from-xml "reports/*.xml"        Update points from JUnit/pytest results
`;

function positionalInt(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "number" ? value : parseInt(value, 10);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function filterFrom(options: SyncArgs): PointFilterCriteria | undefined {
  const criteria: PointFilterCriteria = {
    currentOutcome: options.filterOutcome,
    automated: options.filterAutomated,
    state: options.filterState,
    nameContains: options.filterName,
  };
  return hasCriteria(criteria) ? criteria : undefined;
}

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  clientProvider?: IAzureClientProvider;
  logger?: ILogger;
};

/** Runs one command line (without the node and script arguments) and returns the exit code. */
export async function run(args: string[], deps: CliDependencies = {}): Promise<number> {
  const argv = yargsFactory(args)
    .scriptName("test-point-sync")
    .usage("$0 <planId> [suiteId] [options]")
    .options({
      detailed: {
        alias: "d",
        type: "boolean",
        default: false,
        describe: "Fetch detailed test case information (slower)",
      },
      output: {
        alias: "o",
        choices: ["console", "json", "csv"],
        default: "console",
        describe: "Output format for listings",
      },
      "update-outcome": {
        choices: REMOTE_OUTCOMES,
        describe: "Update every eligible test point to this outcome",
      },
      comment: {
        type: "string",
        describe: "Comment for updated points; {testName}, {status}, {score} etc. are filled in for XML updates",
      },
      "dry-run": {
        type: "boolean",
        default: false,
        describe: "Preview what would be updated without making changes",
      },
      "filter-outcome": { type: "string", describe: "Only update points with this current outcome" },
      "filter-automated": {
        choices: ["true", "false"],
        describe: "Only update points with this automation status",
      },
      "filter-state": { type: "string", describe: "Only update points in this state" },
      "filter-name": { type: "string", describe: "Only update points whose test name contains this text" },
      "from-xml": {
        type: "string",
        describe: "Update points from a JUnit/pytest XML file (or glob pattern)",
      },
      "min-score": {
        type: "number",
        default: 80,
        describe: "Minimum fuzzy matching score (0-100) for XML matching",
      },
      concurrency: {
        type: "number",
        default: 1,
        describe: "Parallel point updates",
      },
      "show-config": {
        type: "boolean",
        default: false,
        describe: "Display current configuration and exit",
      },
    })
    .epilog(EPILOG)
    .strictOptions()
    .parseSync();

  const logger = deps.logger ?? new ConsoleLogger();
  const configService = new ConfigService(deps.env);
  const filterAutomated = argv["filter-automated"];
  const options = configService.loadArgs({
    planId: positionalInt(argv._[0]),
    suiteId: positionalInt(argv._[1]),
    detailed: argv.detailed,
    output: argv.output,
    updateOutcome: argv["update-outcome"],
    comment: argv.comment,
    dryRun: argv["dry-run"],
    filterOutcome: argv["filter-outcome"],
    filterAutomated: filterAutomated === undefined ? undefined : filterAutomated === "true",
    filterState: argv["filter-state"],
    filterName: argv["filter-name"],
    fromXml: argv["from-xml"],
    minScore: argv["min-score"],
    concurrency: argv.concurrency,
    showConfig: argv["show-config"],
  });
  const env = configService.loadEnvironment();
  const output = new OutputWriter(logger);

  if (options.showConfig) {
    output.printConfig(env);
    return 0;
  }

  if (options.planId === undefined) {
    logger.error("❌ Error: planId is required for test point operations (see --help).");
    return 1;
  }

  logger.log(`🔗 Organization: ${env.orgUrl}`);
  logger.log(`📋 Project: ${env.project}`);

  const clientProvider = deps.clientProvider ?? new AzureClientProvider();
  // Result files are parsed before the first request opens the connection.
  const testPointService = new LazyTestPointService(async () => {
    const clients = await clientProvider.connect(env);
    return new TestPointService(
      clients.testApi,
      clients.testPlanApi,
      clients.workItemApi,
      env.project,
      logger
    );
  });
  const app = new App(
    testPointService,
    new JUnitParser(),
    new ReconciliationEngine(),
    new BulkUpdateOrchestrator(testPointService, logger),
    output,
    logger
  );

  if (options.fromXml) {
    const summary = await app.syncFromResults({
      planId: options.planId,
      suiteId: options.suiteId,
      resultFiles: resolveResultFiles(options.fromXml),
      minScore: options.minScore,
      filter: filterFrom(options),
      comment: options.comment,
      dryRun: options.dryRun,
      concurrency: options.concurrency,
    });
    return summary.totalFailed > 0 ? 1 : 0;
  }

  if (options.updateOutcome) {
    const summary = await app.updateByCriteria({
      planId: options.planId,
      suiteId: options.suiteId,
      outcome: options.updateOutcome,
      filter: filterFrom(options),
      comment: options.comment,
      dryRun: options.dryRun,
      concurrency: options.concurrency,
    });
    return summary.totalFailed > 0 ? 1 : 0;
  }

  await app.list({
    planId: options.planId,
    suiteId: options.suiteId,
    detailed: options.detailed,
    output: options.output,
  });
  return 0;
}

