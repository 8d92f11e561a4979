/**
 * @module formats/dsv
 * @description Delimiter-separated text: tokenizing and format detection
 *
 * @example Delimiter and header detection
 * ```typescript
 * import { detectDelimiter, detectHeaders, splitRecords } from './formats/dsv';
 *
 * const delimiter = detectDelimiter(text);
 * const rows = splitRecords(text, delimiter).map((r) => r.fields);
 * const hasHeader = detectHeaders(rows);
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type { CandidateDelimiter, CSVRowOptions, DSVRecordSpan } from "./types";

export { CSVParseState } from "./types";

// =============================================================================
// RE-EXPORTS - DETECTION
// =============================================================================

export { detectDelimiter, detectHeaders } from "./detection";

// =============================================================================
// RE-EXPORTS - VALIDATION
// =============================================================================

export { ParseTableOptionsSchema, validateParseOptions } from "./validation";

// =============================================================================
// RE-EXPORTS - UTILITIES
// =============================================================================

export { handleRaggedRow, normalizeLineEndings, normalizeText, removeBOM, splitLines } from "./utils";

// =============================================================================
// RE-EXPORTS - STATE MACHINE (Low-level CSV parsing)
// =============================================================================

export { parseCSVRow, splitRecords } from "./state-machine";

// =============================================================================
// RE-EXPORTS - CONSTANTS
// =============================================================================

export {
  CANDIDATE_DELIMITERS,
  DEFAULT_DELIMITER,
  DEFAULT_ESCAPE,
  DEFAULT_QUOTE,
  MAX_DETECTION_LINES,
} from "./constants";
