/**
 * @module codegen
 * @description Value coercion, Python literals and snippet rendering
 */

export { coerceCell } from "./coerce";

export { formatFloat, formatLiteral, formatString, formatValueForCode, NONE_LITERAL } from "./literals";

export { render, renderPandas, renderPolars, renderVector } from "./render";
