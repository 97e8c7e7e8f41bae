import * as fs from "fs";
import * as xml2js from "xml2js";
import { ITestResultParser, TestOutcome, TestStatus } from "./interfaces/ITestResultParser";
import { EmptyResultsError, MalformedXmlError } from "./errors";
import { SecretRedactor } from "./utils/SecretRedactor";

const MAX_XML_SIZE = 50 * 1024 * 1024; // 50MB
const MAX_MSG_LEN = 4096;
const TRUNCATION_SUFFIX = "... (truncated)";

type XmlElement = Record<string, unknown>;

function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attributesOf(element: XmlElement): Record<string, string> {
  const attrs = element.$;
  if (!isElement(attrs)) return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (typeof value === "string") result[key] = value;
  }
  return result;
}

function childrenNamed(element: XmlElement, name: string): unknown[] {
  const children = element[name];
  return Array.isArray(children) ? children : [];
}

/**
 * Collects every <testcase> below `element`, in document order, however deeply
 * the suites are nested. Test cases themselves are not descended into.
 */
function collectTestCases(element: XmlElement, into: XmlElement[]): void {
  for (const [key, value] of Object.entries(element)) {
    if (key === "$" || key === "_" || !Array.isArray(value)) continue;
    for (const child of value) {
      if (!isElement(child)) {
        // A bare <testcase/> parses to a string but is still a test case.
        if (key === "testcase") into.push({});
        continue;
      }
      if (key === "testcase") {
        into.push(child);
      } else {
        collectTestCases(child, into);
      }
    }
  }
}

function markerMessage(marker: unknown): string | undefined {
  let msg: string | undefined;
  if (typeof marker === "string") {
    msg = marker.trim() || undefined;
  } else if (isElement(marker)) {
    const attrMessage = attributesOf(marker).message;
    const text = typeof marker._ === "string" ? marker._.trim() : "";
    msg = attrMessage || text || undefined;
  }
  if (msg && msg.length > MAX_MSG_LEN) {
    msg = msg.substring(0, MAX_MSG_LEN - TRUNCATION_SUFFIX.length) + TRUNCATION_SUFFIX;
  }
  return msg === undefined ? undefined : SecretRedactor.redact(msg);
}

function toOutcome(testCase: XmlElement): TestOutcome {
  const attrs = attributesOf(testCase);
  const failures = childrenNamed(testCase, "failure");
  const errors = childrenNamed(testCase, "error");
  const skipped = childrenNamed(testCase, "skipped");

  // Errors are reported as failures.
  let status: TestStatus = "Passed";
  let failureMessage: string | undefined;
  if (failures.length > 0) {
    status = "Failed";
    failureMessage = markerMessage(failures[0]);
  } else if (errors.length > 0) {
    status = "Failed";
    failureMessage = markerMessage(errors[0]);
  } else if (skipped.length > 0) {
    status = "Skipped";
  }

  const seconds = parseFloat(attrs.time || "0");

  return {
    name: attrs.name || "",
    className: attrs.classname || "",
    durationMs: Number.isFinite(seconds) ? Math.round(seconds * 1000) : 0,
    status,
    failureMessage,
  };
}

export class JUnitParser implements ITestResultParser {
  async parse(filePath: string): Promise<TestOutcome[]> {
    const stats = fs.statSync(filePath);

    if (!stats.isFile()) {
      throw new Error(`JUnit XML path is not a file: ${filePath}`);
    }

    if (stats.size > MAX_XML_SIZE) {
      throw new Error(
        `JUnit XML file is too large (${(stats.size / 1024 / 1024).toFixed(2)}MB). Max allowed: 50MB.`
      );
    }

    const xmlContent = fs.readFileSync(filePath, "utf-8");
    const parser = new xml2js.Parser();

    let parsedXml: unknown;
    try {
      parsedXml = await parser.parseStringPromise(xmlContent);
    } catch (e) {
      throw new MalformedXmlError(filePath, e instanceof Error ? e.message : String(e));
    }

    if (!isElement(parsedXml)) {
      throw new MalformedXmlError(filePath, "document has no root element");
    }

    const testCases: XmlElement[] = [];
    for (const [rootName, root] of Object.entries(parsedXml)) {
      if (!isElement(root)) continue;
      if (rootName === "testcase") {
        testCases.push(root);
      } else {
        collectTestCases(root, testCases);
      }
    }

    if (testCases.length === 0) {
      throw new EmptyResultsError(filePath);
    }

    return testCases.map(toOutcome);
  }

  async parseFiles(filePaths: string[]): Promise<TestOutcome[]> {
    const results: TestOutcome[] = [];
    for (const filePath of filePaths) {
      results.push(...(await this.parse(filePath)));
    }
    return results;
  }
}
