/**
 * Column-name cleaning
 *
 * Header cells become safe Python identifiers, unique within a table.
 */

import { COLUMN_DIGIT_PREFIX, UNNAMED_COLUMN } from "../formats/dsv/constants";

/**
 * Clean one header cell into an identifier
 *
 * @example
 * ```typescript
 * cleanColumnName("123 Col!"); // "col_123_Col"
 * cleanColumnName("Unit Price ($)"); // "Unit_Price"
 * cleanColumnName("!!!"); // "unnamed_col"
 * ```
 */
export function cleanColumnName(name: string): string {
  let clean = name.trim().replace(/[^\p{L}\p{N}_]/gu, "_");

  if (/^\p{Nd}/u.test(clean)) {
    clean = COLUMN_DIGIT_PREFIX + clean;
  }

  clean = clean.replace(/_+/g, "_").replace(/_+$/, "");
  return clean || UNNAMED_COLUMN;
}

/**
 * Clean a header row, suffixing repeats with _2, _3, ... until unique
 */
export function cleanColumnNames(names: readonly string[]): string[] {
  const taken = new Set<string>();
  const result: string[] = [];

  for (const name of names) {
    const base = cleanColumnName(name);
    let candidate = base;
    for (let suffix = 2; taken.has(candidate); suffix++) {
      candidate = `${base}_${suffix}`;
    }
    taken.add(candidate);
    result.push(candidate);
  }

  return result;
}

/**
 * Ordinal names V1..Vn for tables without a header
 */
export function ordinalColumnNames(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `V${index + 1}`);
}
