/**
 * Pasted-text entry points
 *
 * Resolve which source understands a piece of text, then parse or render it.
 */

import { render } from "../codegen/render";
import { detectDelimiter } from "../formats/dsv/detection";
import { splitLines } from "../formats/dsv/utils";
import { parseRows, parseTable } from "../table/parse";
import type { ParsedTable, ParseTableOptions, RenderOptions } from "../types";
import { extractArtifactListing } from "./artifact-listing";

/**
 * Check whether text is a plain delimited table
 *
 * True when there are at least two non-blank lines and the detected
 * delimiter splits every one of them into the same number (> 1) of fields.
 */
export function isTabularText(text: string): boolean {
  const lines = splitLines(text);
  if (lines.length < 2) return false;

  const delimiter = detectDelimiter(lines);
  const first = lines[0]?.split(delimiter).length ?? 0;
  return first > 1 && lines.every((line) => line.split(delimiter).length === first);
}

/**
 * Parse pasted text, recognizing artifact listings before generic DSV
 *
 * An explicit `delimiter` skips listing recognition and parses the text as
 * plain delimited rows.
 *
 * @example
 * ```typescript
 * parsePastedText("x|y\n1|2").columns; // ["x", "y"]
 * ```
 */
export function parsePastedText(text: string, options: ParseTableOptions = {}): ParsedTable {
  const listing = options.delimiter === undefined ? extractArtifactListing(text) : null;
  if (listing) {
    return parseRows(listing, options);
  }
  return parseTable(text, options);
}

/**
 * Parse pasted text and render it in one call
 *
 * @param shape - "polars", "pandas", "vector" or "vector-vertical"
 * @throws {ValidationError} For an unknown shape or invalid options
 */
export function textToCode(
  text: string,
  shape: string,
  options: ParseTableOptions & RenderOptions = {}
): string {
  return render(parsePastedText(text, options), shape, options);
}
