import { NotFoundError, ServiceUnavailableError, TestPointServiceError } from "../errors";

// Failures that would repeat for every following request.
const SYSTEMIC_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);
const SYSTEMIC_STATUSES = new Set([401, 502, 503, 504]);

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e === "object" && e !== null && "statusCode" in e && typeof e.statusCode === "number") {
    return e.statusCode;
  }
  return undefined;
}

function errorCodeOf(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

/**
 * Maps an error thrown by the REST client onto the service error taxonomy.
 * Errors that are already classified pass through unchanged.
 */
export function classifyServiceError(e: unknown, context: string): Error {
  if (
    e instanceof ServiceUnavailableError ||
    e instanceof TestPointServiceError
  ) {
    return e;
  }

  const message = e instanceof Error ? e.message : String(e);
  const statusCode = statusCodeOf(e);
  const code = errorCodeOf(e);

  if ((code && SYSTEMIC_CODES.has(code)) || (statusCode && SYSTEMIC_STATUSES.has(statusCode))) {
    return new ServiceUnavailableError(`${context}: ${message}`, statusCode);
  }
  if (statusCode === 404) {
    return new NotFoundError(`${context}: ${message}`);
  }
  return new TestPointServiceError(`${context}: ${message}`, statusCode);
}
