/**
 * Value coercion
 *
 * Interprets a raw cell under its column's type tag. Cells that do not fit
 * the tag degrade to `missing` instead of failing the render.
 */

import {
  booleanTokenValue,
  isMissingToken,
  parseFloatText,
  parseIntegerText,
} from "../inference/tokens";
import type { CellValue, TypeTag } from "../types";

const MISSING: CellValue = { kind: "missing" };

/**
 * Coerce a raw cell to a tagged value
 *
 * @example
 * ```typescript
 * coerceCell("007", "integer"); // { kind: "integer", value: 7n }
 * coerceCell("abc", "float");   // { kind: "missing" }
 * coerceCell("Yes", "boolean"); // { kind: "boolean", value: true }
 * ```
 */
export function coerceCell(raw: string, tag: TypeTag): CellValue {
  if (isMissingToken(raw)) return MISSING;

  switch (tag) {
    case "integer": {
      const value = parseIntegerText(raw);
      return value === undefined ? MISSING : { kind: "integer", value };
    }
    case "float": {
      const value = parseFloatText(raw);
      return value === undefined ? MISSING : { kind: "float", value };
    }
    case "boolean": {
      const value = booleanTokenValue(raw);
      return value === undefined ? MISSING : { kind: "boolean", value };
    }
    case "date":
      return { kind: "date", text: raw.trim() };
    case "string":
      return { kind: "text", text: raw.trim() };
    default: {
      const _exhaustive: never = tag;
      return _exhaustive;
    }
  }
}
