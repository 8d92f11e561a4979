/**
 * Core type definitions for tablepaste
 *
 * The pipeline is text in, Python source out. Everything in between is
 * built once per call and never mutated, which the readonly modifiers on
 * these types spell out.
 */

import { type } from "arktype";
import { OUTPUT_SHAPES } from "./formats/dsv/constants";

// =============================================================================
// TABLE MODEL
// =============================================================================

/**
 * Classification applied to a whole column
 */
export type TypeTag = "integer" | "float" | "boolean" | "date" | "string";

/**
 * Canonical intermediate result of a parse
 *
 * `data` is rectangular: every row holds exactly `columns.length` raw cells.
 * `types` runs parallel to `columns`.
 */
export interface ParsedTable {
  readonly columns: readonly string[];
  readonly data: readonly (readonly string[])[];
  readonly types: readonly TypeTag[];
}

/**
 * Rows already split into cells by a source that bypasses delimiter detection
 */
export interface SplitTable {
  rows: readonly (readonly string[])[];
  hasHeader?: boolean;
}

/**
 * A raw cell interpreted under its column's type tag
 */
export type CellValue =
  | { readonly kind: "missing" }
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "date"; readonly text: string }
  | { readonly kind: "text"; readonly text: string };

/**
 * Code shapes the renderer can emit
 */
export type OutputShape = (typeof OUTPUT_SHAPES)[number];

// =============================================================================
// OPTIONS
// =============================================================================

export type WarningHandler = (message: string) => void;

export interface ParseTableOptions {
  /** Field delimiter; detected from the text when omitted */
  delimiter?: string;
  /** Cap on the number of data rows kept (header excluded) */
  maxRows?: number;
  /** Force the header decision; detected when omitted */
  hasHeader?: boolean;
  /** Receives recoverable anomalies such as ragged rows */
  onWarning?: WarningHandler;
}

export interface RenderOptions {
  /** Spaces before each column line of a DataFrame */
  indent?: number;
  /** DataFrame columns longer than this are shown head, `...`, tail */
  truncateAfter?: number;
}

export interface FileReaderOptions {
  /** Largest file, in bytes, that will be read into memory */
  maxFileSize?: number;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

export const OutputShapeSchema = type.enumerated(...OUTPUT_SHAPES);

export const RenderOptionsSchema = type({
  "indent?": "number.integer>=0 | undefined",
  "truncateAfter?": "number.integer>=8 | undefined",
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number.integer>=0 | undefined",
});

/**
 * Path string validated for use with the platform FileSystem
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: "a path containing \\0",
    });
  }
  return true;
});
