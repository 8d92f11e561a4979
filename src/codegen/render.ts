/**
 * Code renderers
 *
 * Turn a ParsedTable into Python source. DataFrame shapes may abbreviate
 * long columns for display; vectors always carry every cell.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import {
  DEFAULT_INDENT,
  DEFAULT_TRUNCATE_AFTER,
  TRUNCATED_HEAD,
  TRUNCATED_TAIL,
} from "../formats/dsv/constants";
import {
  type OutputShape,
  OutputShapeSchema,
  type ParsedTable,
  type RenderOptions,
  RenderOptionsSchema,
} from "../types";
import { formatString, formatValueForCode } from "./literals";

interface DataFrameFlavor {
  module: string;
  alias: string;
}

const POLARS: DataFrameFlavor = { module: "polars", alias: "pl" };
const PANDAS: DataFrameFlavor = { module: "pandas", alias: "pd" };

function resolveRenderOptions(options: RenderOptions): Required<RenderOptions> {
  const result = RenderOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid render options: ${result.summary}`);
  }
  return {
    indent: options.indent ?? DEFAULT_INDENT,
    truncateAfter: options.truncateAfter ?? DEFAULT_TRUNCATE_AFTER,
  };
}

/**
 * Join column literals, abbreviating to head, `...`, tail past the threshold
 */
function joinColumnValues(values: readonly string[], truncateAfter: number): string {
  if (values.length > truncateAfter) {
    const head = values.slice(0, TRUNCATED_HEAD).join(", ");
    const tail = values.slice(-TRUNCATED_TAIL).join(", ");
    return `${head}, ..., ${tail}`;
  }
  return values.join(", ");
}

function renderDataFrame(
  table: ParsedTable,
  flavor: DataFrameFlavor,
  options: RenderOptions
): string {
  const { indent, truncateAfter } = resolveRenderOptions(options);
  const header = `import ${flavor.module} as ${flavor.alias}`;

  if (table.data.length === 0) {
    return `${header}\ndf = ${flavor.alias}.DataFrame()`;
  }

  const quotedNames = table.columns.map(formatString);
  const namePad = quotedNames.reduce((max, name) => Math.max(max, name.length), 0);
  const lines = [header, "", `df = ${flavor.alias}.DataFrame({`];

  table.columns.forEach((_, index) => {
    const tag = table.types[index] ?? "string";
    const values = table.data.map((row) => formatValueForCode(row[index] ?? "", tag));
    const name = (quotedNames[index] ?? "").padEnd(namePad);
    lines.push(`${" ".repeat(indent)}${name}: [${joinColumnValues(values, truncateAfter)}],`);
  });

  lines.push("})");
  return lines.join("\n");
}

/**
 * Polars DataFrame constructor code
 *
 * @example
 * ```typescript
 * renderPolars(parseTable("a,b\n1,x"));
 * // import polars as pl
 * //
 * // df = pl.DataFrame({
 * //     "a": [1],
 * //     "b": ["x"],
 * // })
 * ```
 */
export function renderPolars(table: ParsedTable, options: RenderOptions = {}): string {
  return renderDataFrame(table, POLARS, options);
}

/**
 * pandas DataFrame constructor code
 */
export function renderPandas(table: ParsedTable, options: RenderOptions = {}): string {
  return renderDataFrame(table, PANDAS, options);
}

/**
 * Flat Python list of every cell, row-major, each typed by its column
 *
 * Never truncated: the list holds exactly rows * columns literals.
 *
 * @param vertical - One value per line, indented by `options.indent`
 */
export function renderVector(
  table: ParsedTable,
  vertical: boolean = false,
  options: RenderOptions = {}
): string {
  const { indent } = resolveRenderOptions(options);
  if (table.data.length === 0) return "[]";

  const values: string[] = [];
  for (const row of table.data) {
    row.forEach((cell, index) => {
      values.push(formatValueForCode(cell, table.types[index] ?? "string"));
    });
  }

  if (vertical) {
    const pad = " ".repeat(indent);
    return `[\n${pad}${values.join(`,\n${pad}`)}\n]`;
  }
  return `[${values.join(", ")}]`;
}

/**
 * Render a table into the requested output shape
 *
 * @throws {ValidationError} For an unknown shape or invalid options
 */
export function render(table: ParsedTable, shape: string, options: RenderOptions = {}): string {
  const validShape = OutputShapeSchema(shape);
  if (validShape instanceof type.errors) {
    throw new ValidationError(`Unknown output shape "${shape}": ${validShape.summary}`);
  }

  return renderShape(table, validShape, options);
}

function renderShape(table: ParsedTable, shape: OutputShape, options: RenderOptions): string {
  switch (shape) {
    case "polars":
      return renderPolars(table, options);
    case "pandas":
      return renderPandas(table, options);
    case "vector":
      return renderVector(table, false, options);
    case "vector-vertical":
      return renderVector(table, true, options);
  }
}
