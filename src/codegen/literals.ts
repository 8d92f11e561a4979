/**
 * Python literal formatting
 */

import type { CellValue, TypeTag } from "../types";
import { coerceCell } from "./coerce";

export const NONE_LITERAL = "None";

/**
 * Python `repr` of a float
 *
 * Shortest round-trip digits, positional notation for exponents in
 * [-4, 16), scientific otherwise, and always a float-looking result.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'float("nan")';
  if (value === Number.POSITIVE_INFINITY) return 'float("inf")';
  if (value === Number.NEGATIVE_INFINITY) return 'float("-inf")';
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";

  const [mantissa = "", exponentText = "0"] = value.toExponential().split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 16) {
    const sign = exponent < 0 ? "-" : "+";
    return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
  }

  const positional = value.toString();
  return positional.includes(".") ? positional : `${positional}.0`;
}

/**
 * Double-quoted Python string literal
 */
export function formatString(text: string): string {
  return JSON.stringify(text);
}

/**
 * Render a coerced value as Python source text
 */
export function formatLiteral(value: CellValue): string {
  switch (value.kind) {
    case "missing":
      return NONE_LITERAL;
    case "integer":
      return value.value.toString();
    case "float":
      return formatFloat(value.value);
    case "boolean":
      return value.value ? "True" : "False";
    case "date":
    case "text":
      return formatString(value.text);
  }
}

/**
 * Coerce and format a raw cell in one step
 */
export function formatValueForCode(raw: string, tag: TypeTag): string {
  return formatLiteral(coerceCell(raw, tag));
}
