/**
 * DSV Format Type Definitions
 */

import type { CANDIDATE_DELIMITERS } from "./constants";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Delimiters the detector can choose between
 */
export type CandidateDelimiter = (typeof CANDIDATE_DELIMITERS)[number];

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Options for the low-level row parser
 */
export interface CSVRowOptions {
  quote?: string;
  escapeChar?: string;
  /**
   * What to do when input ends inside a quoted field: "error" throws a
   * DSVParseError, "keep" closes the field with the text read so far
   */
  unclosedQuote?: "error" | "keep";
}

/**
 * One logical record, which may span several physical lines
 */
export interface DSVRecordSpan {
  fields: string[];
  /** 1-based line where the record starts */
  lineNumber: number;
  /** Input ended inside a quoted field of this record */
  unclosedQuote: boolean;
}
