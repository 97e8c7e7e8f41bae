import { TestOutcome } from "../interfaces/ITestResultParser";
import { RemoteOutcome } from "../interfaces/ITestPointService";
import { SecretRedactor } from "./SecretRedactor";

export type CommentContext = {
  source: TestOutcome;
  outcome: RemoteOutcome;
  score: number;
};

/**
 * Fills `{testName}`, `{className}`, `{status}`, `{outcome}`, `{score}`,
 * `{durationMs}` and `{message}` in a comment template. Other braces are left
 * as written. The test name is redacted, since the comment leaves the process.
 */
export function renderComment(template: string, context: CommentContext): string {
  const values: Record<string, string> = {
    testName: SecretRedactor.redact(context.source.name),
    className: context.source.className,
    status: context.source.status,
    outcome: context.outcome,
    score: String(context.score),
    durationMs: String(context.source.durationMs),
    message: context.source.failureMessage ?? "",
  };

  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
  );
}
