
/**
 * Guards a cell against formula injection when the CSV is opened in a
 * spreadsheet: values starting with =, + or @ (or - not followed by a space)
 * get a leading single quote.
 */
export function sanitizeForCsv(value: string): string {
  if (!value) return value;

  // Excel ignores leading whitespace when it decides a cell is a formula.
  const trimmed = value.trim();
  const firstChar = trimmed.charAt(0);

  if (firstChar === "=" || firstChar === "+" || firstChar === "@") {
    return `'${value}`;
  }
  if (firstChar === "-" && trimmed.charAt(1) !== " ") {
    return `'${value}`;
  }
  return value;
}

/** Quotes a cell when it holds a delimiter, quote or line break (RFC 4180). */
export function quoteCsvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvRow(cells: ReadonlyArray<string | number | boolean | undefined>): string {
  return cells
    .map((cell) => {
      if (cell === undefined) return "";
      return quoteCsvCell(typeof cell === "string" ? sanitizeForCsv(cell) : String(cell));
    })
    .join(",");
}
