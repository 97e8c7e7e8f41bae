import * as fs from "fs";
import * as path from "path";
import * as glob from "glob";

/**
 * Expands the --from-xml argument: an existing path is used as is, anything
 * else is treated as a glob pattern. Matches come back sorted.
 */
export function resolveResultFiles(pattern: string, cwd: string = process.cwd()): string[] {
  const direct = path.resolve(cwd, pattern);
  if (fs.existsSync(direct)) {
    return [direct];
  }

  const matches = glob
    .sync(pattern, { cwd, nodir: true, absolute: true })
    .sort();

  if (matches.length === 0) {
    throw new Error(`No test result files match "${pattern}".`);
  }
  return matches;
}
