/**
 * @module formats/dsv/validation
 * @description ArkType schemas for parse options
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { ParseTableOptions } from "../../types";

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * ArkType validation schema for parseTable options
 *
 * `onWarning` is not declared; undeclared keys pass through untouched.
 */
export const ParseTableOptionsSchema = type({
  "delimiter?": "string | undefined",
  "maxRows?": "number.integer>=0 | undefined",
  "hasHeader?": "boolean | undefined",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.delimiter === '"' || options.delimiter === "\n") {
    return ctx.reject({
      path: ["delimiter"],
      expected: "a delimiter other than the quote character or a newline",
      actual: JSON.stringify(options.delimiter),
    });
  }

  return true;
});

/**
 * Validate parse options, throwing ValidationError on contract violations
 */
export function validateParseOptions(options: ParseTableOptions): ParseTableOptions {
  const result = ParseTableOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid parse options: ${result.summary}`);
  }
  return options;
}
