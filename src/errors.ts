export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class MalformedXmlError extends Error {
  constructor(filePath: string, reason: string) {
    super(`Malformed XML in ${filePath}: ${reason}`);
    this.name = "MalformedXmlError";
  }
}

export class EmptyResultsError extends Error {
  constructor(filePath: string) {
    super(`No <testcase> elements found in ${filePath}`);
    this.name = "EmptyResultsError";
  }
}

/**
 * A request against the test management service failed for one item only.
 * Callers may record it and carry on with the next item.
 */
export class TestPointServiceError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = "TestPointServiceError";
  }
}

export class NotFoundError extends TestPointServiceError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/**
 * The service cannot be reached or refuses our credentials; every further
 * call would fail the same way.
 */
export class ServiceUnavailableError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = "ServiceUnavailableError";
  }
}
