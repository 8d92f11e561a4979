/**
 * Type inference definitions
 */

import type { TypeTag } from "../types";

/**
 * Outcome of classifying one cell: a type vote, or no vote at all
 */
export type CellClass = TypeTag | "missing";

/**
 * Votes per type tag for one column, missing cells excluded
 */
export type VoteTally = ReadonlyMap<TypeTag, number>;

/**
 * One row of the column resolution decision table
 *
 * `resolve` returns a tag when the rule applies and undefined to defer to
 * the next rule.
 */
export interface ResolutionRule {
  readonly name: string;
  readonly resolve: (tally: VoteTally, totalVotes: number) => TypeTag | undefined;
}
