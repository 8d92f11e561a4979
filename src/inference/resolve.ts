/**
 * Column-level type resolution
 *
 * A column gets exactly one tag. Votes from its non-missing cells are run
 * through RESOLUTION_RULES in order; the first rule that returns a tag wins.
 */

import { MAJORITY_THRESHOLD } from "../formats/dsv/constants";
import type { TypeTag } from "../types";
import { classifyCell } from "./classify";
import type { ResolutionRule, VoteTally } from "./types";

const NUMERIC_TAGS: ReadonlySet<TypeTag> = new Set(["integer", "float"]);

export const RESOLUTION_RULES: readonly ResolutionRule[] = [
  {
    name: "all-missing",
    resolve: (_tally, total) => (total === 0 ? "string" : undefined),
  },
  {
    name: "unanimous",
    resolve: (tally) => {
      const [only] = tally.keys();
      return tally.size === 1 ? only : undefined;
    },
  },
  {
    name: "majority",
    resolve: (tally, total) => {
      for (const [tag, count] of tally) {
        if (count / total > MAJORITY_THRESHOLD) return tag;
      }
      return undefined;
    },
  },
  {
    name: "numeric-widening",
    resolve: (tally) => ([...tally.keys()].every((tag) => NUMERIC_TAGS.has(tag)) ? "float" : undefined),
  },
  {
    name: "mixed-fallback",
    resolve: () => "string",
  },
];

/**
 * Count type votes for a column, skipping missing cells
 */
export function tallyVotes(values: readonly string[]): VoteTally {
  const tally = new Map<TypeTag, number>();
  for (const value of values) {
    const cellClass = classifyCell(value);
    if (cellClass === "missing") continue;
    tally.set(cellClass, (tally.get(cellClass) ?? 0) + 1);
  }
  return tally;
}

/**
 * Resolve a tally to one tag using the decision table
 */
export function resolveTally(tally: VoteTally): TypeTag {
  let total = 0;
  for (const count of tally.values()) total += count;

  for (const rule of RESOLUTION_RULES) {
    const tag = rule.resolve(tally, total);
    if (tag !== undefined) return tag;
  }
  return "string";
}

/**
 * Infer the type tag of one column of raw cells
 *
 * @example
 * ```typescript
 * inferColumnType(["1", "2.5", "3"]);     // "float"
 * inferColumnType(["true", "false", "1"]); // "string"
 * inferColumnType(["1", "NA", "3"]);      // "integer"
 * ```
 */
export function inferColumnType(values: readonly string[]): TypeTag {
  return resolveTally(tallyVotes(values));
}

/**
 * Infer one tag per column from row-major data
 *
 * @param rows - Rectangular rows
 * @param columnCount - Number of columns to infer
 */
export function inferColumnTypes(
  rows: readonly (readonly string[])[],
  columnCount: number
): TypeTag[] {
  return Array.from({ length: columnCount }, (_, index) =>
    inferColumnType(rows.map((row) => row[index] ?? ""))
  );
}
