import * as path from "path";
import * as fs from "fs";
import * as dotenv from "dotenv";
import { AppEnv, IConfigService, OutputFormat, RawArgs, SyncArgs } from "./interfaces/IConfigService";
import { REMOTE_OUTCOMES, RemoteOutcome } from "./interfaces/ITestPointService";
import { ConfigurationError } from "./errors";
import { DEFAULT_MIN_SCORE } from "./FuzzyMatcher";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["console", "json", "csv"];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isRemoteOutcome(value: string): value is RemoteOutcome {
  return REMOTE_OUTCOMES.some((outcome) => outcome === value);
}

export class ConfigService implements IConfigService {
  constructor(private env: NodeJS.ProcessEnv = process.env) { }

  loadEnvironment(): AppEnv {
    // A local .env (gitignored) may hold the token outside pipelines; real
    // environment variables win over it.
    const envPath = this.env.TEST_POINT_SYNC_ENV || path.resolve(".env");
    const fileValues: Record<string, string> = fs.existsSync(envPath)
      ? dotenv.parse(fs.readFileSync(envPath))
      : {};
    const read = (...names: string[]): string => {
      for (const name of names) {
        const value = this.env[name] || fileValues[name];
        if (value) return value;
      }
      return "";
    };

    const pat = read("AZURE_DEVOPS_PAT");
    const token = pat || read("SYSTEM_ACCESSTOKEN");
    const orgUrl = read("AZURE_DEVOPS_ORG", "SYSTEM_TEAMFOUNDATIONCOLLECTIONURI");
    const project = read("AZURE_DEVOPS_PROJECT", "SYSTEM_TEAMPROJECT");

    const missing: string[] = [];
    if (!token) missing.push("AZURE_DEVOPS_PAT");
    if (!orgUrl) missing.push("AZURE_DEVOPS_ORG");
    if (!project) missing.push("AZURE_DEVOPS_PROJECT");

    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing required configuration: ${missing.join(", ")}. ` +
          "Set the environment variables (or SYSTEM_* values in a pipeline) or add them to .env."
      );
    }

    return { token, authType: pat ? "pat" : "bearer", orgUrl: orgUrl.replace(/\/+$/, ""), project };
  }

  loadArgs(argv: RawArgs): SyncArgs {
    const output = argv.output ?? "console";
    if (!isOutputFormat(output)) {
      throw new ConfigurationError(`Unsupported output format "${output}" (use console, json or csv).`);
    }

    let updateOutcome: RemoteOutcome | undefined;
    if (argv.updateOutcome !== undefined) {
      if (!isRemoteOutcome(argv.updateOutcome)) {
        throw new ConfigurationError(
          `Unsupported outcome "${argv.updateOutcome}" (use one of ${REMOTE_OUTCOMES.join(", ")}).`
        );
      }
      updateOutcome = argv.updateOutcome;
    }

    const minScore = argv.minScore ?? DEFAULT_MIN_SCORE;
    if (!Number.isInteger(minScore) || minScore < 0 || minScore > 100) {
      throw new ConfigurationError(`--min-score must be an integer between 0 and 100 (got ${minScore}).`);
    }

    const concurrency = argv.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`--concurrency must be a positive integer (got ${concurrency}).`);
    }

    return {
      planId: argv.planId,
      suiteId: argv.suiteId,
      detailed: argv.detailed ?? false,
      output,
      updateOutcome,
      comment: argv.comment,
      dryRun: argv.dryRun ?? false,
      filterOutcome: argv.filterOutcome,
      filterAutomated: argv.filterAutomated,
      filterState: argv.filterState,
      filterName: argv.filterName,
      fromXml: argv.fromXml,
      minScore,
      concurrency,
      showConfig: argv.showConfig ?? false,
    };
  }
}
