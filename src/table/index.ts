/**
 * @module table
 * @description ParsedTable assembly from pasted text or pre-split rows
 */

export { cleanColumnName, cleanColumnNames, ordinalColumnNames } from "./column-names";

export { emptyTable, inferTypes, parseRows, parseTable } from "./parse";
