/**
 * DSV Format Constants
 *
 * Delimiters, sampling limits and rendering defaults shared by the
 * detection, inference and code generation stages.
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Candidate delimiters tried during detection, in tie-break order
 */
export const CANDIDATE_DELIMITERS = [",", "\t", "|", ";"] as const;

/**
 * Delimiter used when no candidate splits the sample consistently
 */
export const DEFAULT_DELIMITER = ",";

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Default escape character (doubling quotes per RFC 4180)
 */
export const DEFAULT_ESCAPE = '"';

/**
 * Maximum number of non-blank lines sampled for delimiter detection
 */
export const MAX_DETECTION_LINES = 10;

/**
 * A type must hold strictly more than this share of a column's votes to win
 */
export const MAJORITY_THRESHOLD = 0.9;

/**
 * Header cells averaging under this share of the data cell length mark a header
 */
export const HEADER_LENGTH_RATIO = 0.6;

/**
 * Cell values treated as absent data (compared lowercase, after trimming)
 */
export const MISSING_TOKENS = ["na", "n/a", "none", "null", ""] as const;

export const TRUE_TOKENS = ["true", "yes", "y", "t", "1"] as const;
export const FALSE_TOKENS = ["false", "no", "n", "f", "0"] as const;

/**
 * Output code shapes accepted by the renderer
 */
export const OUTPUT_SHAPES = ["polars", "pandas", "vector", "vector-vertical"] as const;

/**
 * DataFrame columns with more values than this are displayed truncated
 */
export const DEFAULT_TRUNCATE_AFTER = 10;
export const TRUNCATED_HEAD = 5;
export const TRUNCATED_TAIL = 3;

export const DEFAULT_INDENT = 4;

/**
 * Prefix for cleaned column names that would otherwise start with a digit
 */
export const COLUMN_DIGIT_PREFIX = "col_";

/**
 * Name used when cleaning leaves nothing behind
 */
export const UNNAMED_COLUMN = "unnamed_col";

/**
 * Maximum file size read by readTableFile (100MB)
 */
export const MAX_FILE_SIZE = 104_857_600;
