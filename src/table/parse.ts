/**
 * Table assembly
 *
 * Orchestrates delimiter detection, tokenizing, header detection and type
 * inference into one frozen ParsedTable.
 */

import { detectDelimiter, detectHeaders } from "../formats/dsv/detection";
import { splitRecords } from "../formats/dsv/state-machine";
import { handleRaggedRow, normalizeText } from "../formats/dsv/utils";
import { validateParseOptions } from "../formats/dsv/validation";
import { inferColumnTypes } from "../inference/resolve";
import type {
  ParsedTable,
  ParseTableOptions,
  SplitTable,
  TypeTag,
  WarningHandler,
} from "../types";
import { cleanColumnNames, ordinalColumnNames } from "./column-names";

const warnToConsole: WarningHandler = (message) => {
  console.warn(`tablepaste: ${message}`);
};

function freezeTable(
  columns: readonly string[],
  data: readonly (readonly string[])[],
  types: readonly TypeTag[]
): ParsedTable {
  return Object.freeze({
    columns: Object.freeze([...columns]),
    data: Object.freeze(data.map((row) => Object.freeze([...row]))),
    types: Object.freeze([...types]),
  });
}

/**
 * A table with no columns, rows or types
 */
export function emptyTable(): ParsedTable {
  return freezeTable([], [], []);
}

/**
 * Build the table from split rows; shared by text and pre-split sources
 */
function assemble(
  rows: readonly (readonly string[])[],
  hasHeader: boolean | undefined,
  maxRows: number | undefined,
  warn: WarningHandler
): ParsedTable {
  const nonEmpty = rows.filter((row) => row.length > 0);
  const [firstRow] = nonEmpty;
  if (!firstRow) return emptyTable();

  // A lone row is always data, even when a header was requested
  const useHeader = (hasHeader ?? detectHeaders(nonEmpty)) && nonEmpty.length > 1;
  const columns = useHeader ? cleanColumnNames(firstRow) : ordinalColumnNames(firstRow.length);
  const body = useHeader ? nonEmpty.slice(1) : nonEmpty;
  const kept = maxRows === undefined ? body : body.slice(0, maxRows);

  let adjusted = 0;
  const data = kept.map((row) => {
    if (row.length !== columns.length) adjusted++;
    return handleRaggedRow(row, columns.length);
  });
  if (adjusted > 0) {
    warn(`${adjusted} row(s) padded or truncated to ${columns.length} columns`);
  }

  return freezeTable(columns, data, inferColumnTypes(data, columns.length));
}

/**
 * Parse pasted text into a typed table
 *
 * Empty or whitespace-only text yields the empty table. Messy input never
 * throws: ragged rows are fitted to the column count and an unclosed quote
 * keeps the text read so far, both reported through `onWarning`.
 *
 * @throws {ValidationError} When the options themselves are invalid
 *
 * @example
 * ```typescript
 * const table = parseTable("name,age\nAda,36\nAlan,41");
 * table.columns; // ["name", "age"]
 * table.types;   // ["string", "integer"]
 * ```
 */
export function parseTable(text: string, options: ParseTableOptions = {}): ParsedTable {
  validateParseOptions(options);
  if (!text.trim()) return emptyTable();

  const warn = options.onWarning ?? warnToConsole;
  const normalized = normalizeText(text);
  const delimiter = options.delimiter ?? detectDelimiter(normalized);
  const records = splitRecords(normalized, delimiter);

  const unclosed = records.find((record) => record.unclosedQuote);
  if (unclosed) {
    warn(`unclosed quote in record starting at line ${unclosed.lineNumber}; kept the text as read`);
  }

  return assemble(
    records.map((record) => record.fields),
    options.hasHeader,
    options.maxRows,
    warn
  );
}

/**
 * Assemble a table from rows a source already split
 *
 * Delimiter detection is skipped. An explicit `hasHeader` option wins over
 * the source's own flag, which wins over detection.
 */
export function parseRows(
  split: SplitTable,
  options: Omit<ParseTableOptions, "delimiter"> = {}
): ParsedTable {
  validateParseOptions(options);
  return assemble(
    split.rows,
    options.hasHeader ?? split.hasHeader,
    options.maxRows,
    options.onWarning ?? warnToConsole
  );
}

/**
 * Infer one type tag per column of an existing table
 */
export function inferTypes(table: ParsedTable): TypeTag[] {
  return inferColumnTypes(table.data, table.columns.length);
}
