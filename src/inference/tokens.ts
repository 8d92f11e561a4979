/**
 * Token recognizers for single cell values
 *
 * Each recognizer trims its input and answers one question. Precedence
 * between them is decided by the classifier, not here.
 */

import { FALSE_TOKENS, MISSING_TOKENS, TRUE_TOKENS } from "../formats/dsv/constants";

const DIGITS = String.raw`\d+(?:_\d+)*`;

const INTEGER_PATTERN = new RegExp(`^[+-]?${DIGITS}$`);
const DECIMAL_PATTERN = new RegExp(
  `^[+-]?(?:${DIGITS}\\.?(?:${DIGITS})?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`
);
const SPECIAL_FLOAT_PATTERN = /^[+-]?(?:inf|infinity|nan)$/i;

/**
 * Fixed date layouts, in the order they are tried
 */
export const DATE_PATTERNS: readonly RegExp[] = [
  /^\d{4}-\d{2}-\d{2}$/, // YYYY-MM-DD
  /^\d{1,2}\/\d{1,2}\/\d{4}$/, // MM/DD/YYYY
  /^\d{1,2}\/\d{1,2}\/\d{2}$/, // MM/DD/YY
  /^\d{1,2}-\d{1,2}-\d{4}$/, // DD-MM-YYYY
  /^\d{4}\/\d{1,2}\/\d{1,2}$/, // YYYY/MM/DD
  /^\d{1,2}\s+[a-zA-Z]{3,}\s+\d{4}$/, // DD Month YYYY
  /^[a-zA-Z]{3,}\s+\d{1,2},\s+\d{4}$/, // Month DD, YYYY
];

const missingTokens: ReadonlySet<string> = new Set(MISSING_TOKENS);
const trueTokens: ReadonlySet<string> = new Set(TRUE_TOKENS);
const falseTokens: ReadonlySet<string> = new Set(FALSE_TOKENS);

/**
 * True for NA-style placeholders and blank cells
 */
export function isMissingToken(raw: string): boolean {
  return missingTokens.has(raw.trim().toLowerCase());
}

export function isIntegerText(raw: string): boolean {
  return INTEGER_PATTERN.test(raw.trim());
}

/**
 * Decimal and exponent literals, plus inf/infinity/nan in any case
 */
export function isFloatText(raw: string): boolean {
  const text = raw.trim();
  return DECIMAL_PATTERN.test(text) || SPECIAL_FLOAT_PATTERN.test(text);
}

export function isBooleanToken(raw: string): boolean {
  return booleanTokenValue(raw) !== undefined;
}

/**
 * Truth value of a boolean token, or undefined when the text is not one
 */
export function booleanTokenValue(raw: string): boolean | undefined {
  const text = raw.trim().toLowerCase();
  if (trueTokens.has(text)) return true;
  if (falseTokens.has(text)) return false;
  return undefined;
}

export function isDateText(raw: string): boolean {
  const text = raw.trim();
  return DATE_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Parse integer text to an exact value; undefined when the text is not an integer
 */
export function parseIntegerText(raw: string): bigint | undefined {
  if (!isIntegerText(raw)) return undefined;
  const text = raw.trim().replace(/_/g, "");
  const negative = text.startsWith("-");
  const magnitude = BigInt(text.replace(/^[+-]/, ""));
  return negative ? -magnitude : magnitude;
}

/**
 * Parse float text, including the special values; undefined when not a float
 */
export function parseFloatText(raw: string): number | undefined {
  if (!isFloatText(raw)) return undefined;
  const text = raw.trim().replace(/_/g, "").toLowerCase();
  const unsigned = text.replace(/^[+-]/, "");
  const sign = text.startsWith("-") ? -1 : 1;

  if (unsigned === "nan") return Number.NaN;
  if (unsigned === "inf" || unsigned === "infinity") return sign * Number.POSITIVE_INFINITY;
  return Number(text);
}
