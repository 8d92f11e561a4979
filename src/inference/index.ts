/**
 * @module inference
 * @description Per-cell classification and per-column type resolution
 */

export type { CellClass, ResolutionRule, VoteTally } from "./types";

export { classifyCell } from "./classify";

export {
  inferColumnType,
  inferColumnTypes,
  RESOLUTION_RULES,
  resolveTally,
  tallyVotes,
} from "./resolve";

export {
  booleanTokenValue,
  DATE_PATTERNS,
  isBooleanToken,
  isDateText,
  isFloatText,
  isIntegerText,
  isMissingToken,
  parseFloatText,
  parseIntegerText,
} from "./tokens";
