/**
 * DSV Utility Functions Module
 *
 * Text normalization and row-shape helpers used before and after tokenizing.
 */

/**
 * Remove Byte Order Mark (BOM) from text
 */
export function removeBOM(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/**
 * Normalize line endings to Unix format (LF)
 * Handles Windows (CRLF), Classic Mac (CR), and Unix (LF)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Normalize pasted text: strip BOM, unify line endings
 */
export function normalizeText(text: string): string {
  return normalizeLineEndings(removeBOM(text));
}

/**
 * Split text into its non-blank lines
 *
 * @param text - Raw text, any line endings
 * @param limit - Stop after this many lines
 */
export function splitLines(text: string, limit: number = Number.POSITIVE_INFINITY): string[] {
  const lines: string[] = [];
  for (const line of normalizeText(text).split("\n")) {
    if (lines.length >= limit) break;
    if (line.trim()) lines.push(line);
  }
  return lines;
}

/**
 * Fit a row to the expected column count
 *
 * Short rows are padded with empty cells and long rows are truncated, so the
 * result always has exactly `expectedColumns` cells.
 */
export function handleRaggedRow(fields: readonly string[], expectedColumns: number): string[] {
  if (fields.length >= expectedColumns) {
    return fields.slice(0, expectedColumns);
  }
  return [...fields, ...Array.from({ length: expectedColumns - fields.length }, () => "")];
}
