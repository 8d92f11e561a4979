/**
 * Turning pasted tables into DataFrame code
 *
 * Run with `npm run example`.
 */

import { parseTable, render, textToCode } from "../src";

// ============================================================================
// Example 1: Spreadsheet paste
// ============================================================================

function example1_spreadsheetPaste() {
  console.log("\n=== Example 1: Spreadsheet paste ===\n");

  const pasted = "Region\tUnits\tRevenue\nNorth\t120\t3400.5\nSouth\t98\tNA\n";
  console.log(textToCode(pasted, "polars"));
}

// ============================================================================
// Example 2: One table, every shape
// ============================================================================

function example2_everyShape() {
  console.log("\n=== Example 2: One table, every shape ===\n");

  const table = parseTable("id|active\n1|yes\n2|no");
  console.log(`columns: ${table.columns.join(", ")}  types: ${table.types.join(", ")}\n`);

  for (const shape of ["pandas", "vector", "vector-vertical"]) {
    console.log(render(table, shape));
    console.log();
  }
}

// ============================================================================
// Example 3: Messy input
// ============================================================================

function example3_messyInput() {
  console.log("\n=== Example 3: Messy input ===\n");

  const table = parseTable("a,b,c\n1,2\n3,4,5,6", {
    onWarning: (message) => console.log(`  warning: ${message}`),
  });
  console.log(render(table, "vector"));
}

example1_spreadsheetPaste();
example2_everyShape();
example3_messyInput();
