/**
 * Table assembly tests
 */

import { describe, expect, test, vi } from "vitest";
import { ValidationError } from "../../src/errors";
import {
  cleanColumnName,
  cleanColumnNames,
  emptyTable,
  inferTypes,
  ordinalColumnNames,
  parseRows,
  parseTable,
} from "../../src/table";

describe("parseTable", () => {
  test("detects a header row", () => {
    expect(parseTable("a,b,c\n1,2,3\n4,5,6")).toEqual({
      columns: ["a", "b", "c"],
      data: [
        ["1", "2", "3"],
        ["4", "5", "6"],
      ],
      types: ["integer", "integer", "integer"],
    });
  });

  test("numeric first row is kept as data with ordinal names", () => {
    const table = parseTable("1,2,3\n4,5,6");

    expect(table.columns).toEqual(["V1", "V2", "V3"]);
    expect(table.data).toEqual([
      ["1", "2", "3"],
      ["4", "5", "6"],
    ]);
  });

  test("blank text is the empty table", () => {
    expect(parseTable("")).toEqual({ columns: [], data: [], types: [] });
    expect(parseTable("  \n \t\n")).toEqual(emptyTable());
  });

  test("tab-separated input", () => {
    const table = parseTable("city\tpop\nOslo\t709000\nBergen\t291000\n");

    expect(table.columns).toEqual(["city", "pop"]);
    expect(table.types).toEqual(["string", "integer"]);
  });

  test("CRLF line endings parse like LF", () => {
    expect(parseTable("a,b\r\n1,2\r\n")).toEqual(parseTable("a,b\n1,2\n"));
  });

  test("missing cells keep the column type", () => {
    const table = parseTable("id,score\n1,NA\n2,3.5\n3,");

    expect(table.types).toEqual(["integer", "float"]);
    expect(table.data[2]).toEqual(["3", ""]);
  });

  test("quoted fields", () => {
    const table = parseTable('name,quote\nAda,"Hello, world"\nAlan,"He said ""hi"""');

    expect(table.columns).toEqual(["name", "quote"]);
    expect(table.data).toEqual([
      ["Ada", "Hello, world"],
      ["Alan", 'He said "hi"'],
    ]);
  });

  test("is idempotent", () => {
    const text = "x|y\n1|a\n2|b";
    const options = { delimiter: "|", hasHeader: true };

    expect(parseTable(text)).toEqual(parseTable(text));
    expect(parseTable(text, options)).toEqual(parseTable(text, options));
  });

  test("output is frozen", () => {
    const table = parseTable("a,b\n1,2");

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.columns)).toBe(true);
    expect(Object.isFrozen(table.data[0])).toBe(true);
  });

  test("types match inferTypes on the result", () => {
    const table = parseTable("a,b,c\n1,x,2.5\n2,y,3");
    expect(inferTypes(table)).toEqual([...table.types]);
  });

  test("header names are cleaned and made unique", () => {
    expect(parseTable("123 Col!,Col,Col\n1,2,3").columns).toEqual(["col_123_Col", "Col", "Col_2"]);
  });

  describe("options", () => {
    test("hasHeader false keeps the first row as data", () => {
      const table = parseTable("a,b\n1,2", { hasHeader: false });

      expect(table.columns).toEqual(["V1", "V2"]);
      expect(table.data).toEqual([
        ["a", "b"],
        ["1", "2"],
      ]);
      expect(table.types).toEqual(["string", "string"]);
    });

    test("a single row is data even when a header is forced", () => {
      const table = parseTable("x,y", { hasHeader: true });

      expect(table.columns).toEqual(["V1", "V2"]);
      expect(table.data).toEqual([["x", "y"]]);
    });

    test("an explicit delimiter skips detection", () => {
      const table = parseTable("a;b\n1;2", { delimiter: "," });

      expect(table.columns).toEqual(["V1"]);
      expect(table.data).toEqual([["a;b"], ["1;2"]]);
    });

    test("maxRows caps data rows after the header", () => {
      const table = parseTable("n\n1\n2\n3\n4", { maxRows: 2 });

      expect(table.columns).toEqual(["n"]);
      expect(table.data).toEqual([["1"], ["2"]]);
    });

    test("invalid options throw ValidationError", () => {
      expect(() => parseTable("a", { delimiter: ",," })).toThrow(ValidationError);
      expect(() => parseTable("a", { maxRows: -1 })).toThrow(ValidationError);
    });
  });

  describe("warnings", () => {
    test("ragged rows are fitted and reported once", () => {
      const onWarning = vi.fn();
      const table = parseTable("a,b,c\n1,2\n3,4,5,6", { onWarning });

      expect(table.data).toEqual([
        ["1", "2", ""],
        ["3", "4", "5"],
      ]);
      expect(table.types).toEqual(["integer", "integer", "integer"]);
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith("2 row(s) padded or truncated to 3 columns");
    });

    test("an unclosed quote keeps the text and warns", () => {
      const onWarning = vi.fn();
      const table = parseTable('a,b\n1,"open', { onWarning });

      expect(table.data).toEqual([["1", "open"]]);
      expect(onWarning).toHaveBeenCalledWith(
        "unclosed quote in record starting at line 2; kept the text as read"
      );
    });

    test("warnings go to the console by default", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      try {
        parseTable("a,b\n1");
        expect(warn).toHaveBeenCalledWith("tablepaste: 1 row(s) padded or truncated to 2 columns");
      } finally {
        warn.mockRestore();
      }
    });

    test("clean input produces no warning", () => {
      const onWarning = vi.fn();
      parseTable("a,b\n1,2", { onWarning });
      expect(onWarning).not.toHaveBeenCalled();
    });
  });
});

describe("parseRows", () => {
  test("uses the source's header flag", () => {
    const table = parseRows({
      rows: [
        ["Name", "Size"],
        ["x", "1"],
      ],
      hasHeader: true,
    });

    expect(table.columns).toEqual(["Name", "Size"]);
    expect(table.types).toEqual(["string", "integer"]);
  });

  test("an explicit option wins over the source flag", () => {
    const table = parseRows(
      {
        rows: [
          ["Name", "Size"],
          ["x", "1"],
        ],
        hasHeader: true,
      },
      { hasHeader: false }
    );

    expect(table.columns).toEqual(["V1", "V2"]);
    expect(table.data).toHaveLength(2);
  });
});

describe("column names", () => {
  test("cleanColumnName", () => {
    expect(cleanColumnName("123 Col!")).toBe("col_123_Col");
    expect(cleanColumnName("Unit Price ($)")).toBe("Unit_Price");
    expect(cleanColumnName("  spaced  ")).toBe("spaced");
    expect(cleanColumnName("naïve col")).toBe("naïve_col");
    expect(cleanColumnName("_private")).toBe("_private");
    expect(cleanColumnName("2nd")).toBe("col_2nd");
    expect(cleanColumnName("!!!")).toBe("unnamed_col");
    expect(cleanColumnName("")).toBe("unnamed_col");
  });

  test("cleanColumnNames suffixes repeats", () => {
    expect(cleanColumnNames(["a", "a", "a_2", "a"])).toEqual(["a", "a_2", "a_2_2", "a_3"]);
    expect(cleanColumnNames(["", "?"])).toEqual(["unnamed_col", "unnamed_col_2"]);
  });

  test("ordinalColumnNames", () => {
    expect(ordinalColumnNames(3)).toEqual(["V1", "V2", "V3"]);
    expect(ordinalColumnNames(0)).toEqual([]);
  });
});
