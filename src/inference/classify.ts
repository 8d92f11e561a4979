/**
 * Per-cell classification
 *
 * Checks run integer, float, boolean, date, string and the first match
 * wins, so "1" is an integer even though it is also a boolean token.
 */

import type { TypeTag } from "../types";
import { isBooleanToken, isDateText, isFloatText, isIntegerText, isMissingToken } from "./tokens";
import type { CellClass } from "./types";

const CELL_CHECKS: readonly (readonly [TypeTag, (text: string) => boolean])[] = [
  ["integer", isIntegerText],
  ["float", isFloatText],
  ["boolean", isBooleanToken],
  ["date", isDateText],
];

/**
 * Classify a single raw cell
 *
 * @example
 * ```typescript
 * classifyCell("42");         // "integer"
 * classifyCell("n/a");        // "missing"
 * classifyCell("2024-01-31"); // "date"
 * ```
 */
export function classifyCell(raw: string): CellClass {
  if (isMissingToken(raw)) return "missing";

  for (const [tag, matches] of CELL_CHECKS) {
    if (matches(raw)) return tag;
  }
  return "string";
}
