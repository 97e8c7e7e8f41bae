import { TestStatus } from "./interfaces/ITestResultParser";
import { RemoteOutcome } from "./interfaces/ITestPointService";

export const OUTCOME_MAP: Readonly<Record<TestStatus, RemoteOutcome>> = {
  Passed: "Passed",
  Failed: "Failed",
  Error: "Failed",
  Skipped: "Blocked",
};
