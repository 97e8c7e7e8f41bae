const CAMEL_BOUNDARY = /([a-z0-9])([A-Z])/g;
const SEPARATORS = /[_.\-\s]+/g;
const TEST_PREFIX = /^test(?: |$)/;

/**
 * Reduces a test identifier to a comparable form: camelCase split into words,
 * separators collapsed to single spaces, lower-cased and without the leading
 * "test" token. Used on both sides of a comparison so that
 * `test_login_success`, `testLoginSuccess` and `Login Success` all become
 * `login success`.
 *
 * Idempotent. Returns "" when nothing but boilerplate is left.
 */
export function normalizeTestName(raw: string): string {
  let name = raw
    .replace(CAMEL_BOUNDARY, "$1 $2")
    .replace(SEPARATORS, " ")
    .trim()
    .toLowerCase();

  while (TEST_PREFIX.test(name)) {
    name = name.replace(TEST_PREFIX, "");
  }

  return name;
}
