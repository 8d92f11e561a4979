/**
 * tablepaste - Turn pasted tables into Python DataFrame code
 *
 * Delimiter and header detection, per-column type inference, and literal
 * formatting for messy clipboard text, with polars, pandas and flat-list
 * renderers on top.
 */

// Code generation
export {
  coerceCell,
  formatFloat,
  formatLiteral,
  formatString,
  formatValueForCode,
  NONE_LITERAL,
  render,
  renderPandas,
  renderPolars,
  renderVector,
} from "./codegen";
// Error types
export {
  DSVParseError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  TablePasteError,
  ValidationError,
} from "./errors";
// Tokenizing and detection
export {
  CANDIDATE_DELIMITERS,
  type CandidateDelimiter,
  DEFAULT_DELIMITER,
  detectDelimiter,
  detectHeaders,
  normalizeText,
  parseCSVRow,
  ParseTableOptionsSchema,
  splitRecords,
} from "./formats/dsv";
// Type inference
export {
  type CellClass,
  classifyCell,
  inferColumnType,
  inferColumnTypes,
  RESOLUTION_RULES,
  type ResolutionRule,
} from "./inference";
// File input
export { readTableFile, readToString } from "./io/file-reader";
// Text sources
export {
  extractArtifactListing,
  isTabularText,
  looksLikeArtifactListing,
  parsePastedText,
  textToCode,
} from "./sources";
// Table assembly
export {
  cleanColumnName,
  cleanColumnNames,
  emptyTable,
  inferTypes,
  parseRows,
  parseTable,
} from "./table";
// Core types
export type {
  CellValue,
  FileReaderOptions,
  OutputShape,
  ParsedTable,
  ParseTableOptions,
  RenderOptions,
  SplitTable,
  TypeTag,
  WarningHandler,
} from "./types";
