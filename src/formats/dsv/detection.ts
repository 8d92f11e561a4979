/**
 * DSV Format Detection Module
 *
 * Automatic detection of the delimiter and of a header row for pasted
 * delimiter-separated text.
 */

import { classifyCell } from "../../inference/classify";
import {
  CANDIDATE_DELIMITERS,
  DEFAULT_DELIMITER,
  HEADER_LENGTH_RATIO,
  MAX_DETECTION_LINES,
} from "./constants";
import type { CandidateDelimiter } from "./types";
import { splitLines } from "./utils";

const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Field count per sampled line for one candidate, or null when no line counts
 */
function fieldCounts(lines: readonly string[], delimiter: string): number[] | null {
  const counts: number[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    // Skip blank lines and lines holding nothing but the delimiter
    if (!trimmed || trimmed === delimiter) continue;
    counts.push(line.split(delimiter).length);
  }
  return counts.length > 0 ? counts : null;
}

/**
 * Detect the delimiter used in DSV content
 *
 * Samples up to the first 10 non-blank lines. A candidate is consistent when
 * every sampled line splits into the same number of fields; among consistent
 * candidates the one giving the most fields wins, earlier candidates winning
 * ties. Falls back to comma when no candidate consistently yields more
 * than one field.
 *
 * @param input - Raw text, or lines already split from it
 * @returns The detected delimiter
 *
 * @example
 * ```typescript
 * detectDelimiter("a\tb\tc\n1\t2\t3"); // "\t"
 * detectDelimiter("");                  // ","
 * ```
 */
export function detectDelimiter(input: string | readonly string[]): CandidateDelimiter {
  const lines =
    typeof input === "string"
      ? splitLines(input, MAX_DETECTION_LINES)
      : input.filter((line) => line.trim()).slice(0, MAX_DETECTION_LINES);
  if (lines.length === 0) return DEFAULT_DELIMITER;

  // A candidate that never splits a line is consistent at one field; that
  // says nothing about the delimiter, so a winner needs at least two fields
  let bestDelimiter: CandidateDelimiter = DEFAULT_DELIMITER;
  let bestCount = 1;

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const counts = fieldCounts(lines, delimiter);
    if (!counts) continue;

    const [first] = counts;
    if (first === undefined || !counts.every((count) => count === first)) continue;

    if (first > bestCount) {
      bestCount = first;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}

function averageLength(cells: readonly string[]): number {
  if (cells.length === 0) return 0;
  return cells.reduce((sum, cell) => sum + cell.length, 0) / cells.length;
}

/**
 * Detect if the first row contains headers
 *
 * Rules, first match wins:
 * 1. fewer than two rows: no header
 * 2. row 0 is all strings and row 1 has a non-string cell: header
 * 3. every row-0 cell looks like an identifier: header
 * 4. with more than two rows, row-0 cells averaging under 60% of the data
 *    cell length: header
 *
 * Cells are classified one at a time, as a single-cell column would be.
 *
 * @param rows - Rows split by the chosen delimiter, header not yet removed
 * @returns True if first row appears to be headers, false otherwise
 *
 * @example
 * ```typescript
 * detectHeaders([["a", "b"], ["1", "2"]]); // true
 * detectHeaders([["1", "2"], ["3", "4"]]); // false
 * ```
 */
export function detectHeaders(rows: readonly (readonly string[])[]): boolean {
  const [firstRow, secondRow] = rows;
  if (!firstRow || !secondRow) return false;

  const cellType = (cell: string) => {
    const cellClass = classifyCell(cell);
    return cellClass === "missing" ? "string" : cellClass;
  };

  if (
    firstRow.every((cell) => cellType(cell) === "string") &&
    secondRow.some((cell) => cellType(cell) !== "string")
  ) {
    return true;
  }

  if (firstRow.length > 0 && firstRow.every((cell) => IDENTIFIER_PATTERN.test(cell))) {
    return true;
  }

  if (rows.length > 2 && firstRow.length > 0) {
    const dataRows = rows.slice(1);
    let dataLength = 0;
    for (const row of dataRows) {
      for (const cell of row) dataLength += cell.length;
    }
    // Normalized by the header width, as if every data row were rectangular
    const avgDataLength = dataLength / (dataRows.length * firstRow.length);

    if (averageLength(firstRow) < avgDataLength * HEADER_LENGTH_RATIO) {
      return true;
    }
  }

  return false;
}
