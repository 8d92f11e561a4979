/**
 * Text source tests: artifact listings and pasted-text entry points
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import {
  extractArtifactListing,
  isTabularText,
  looksLikeArtifactListing,
  parsePastedText,
  textToCode,
} from "../../src/sources";

const LISTING = [
  "Name \tSize \t",
  "wheels-linux-x86_64",
  "\t4.2 MB \t",
  "wheels-linux-aarch64",
  "\t3.78 MB \t",
  "wheels-macos-arm64",
  "\t4.63 MB \t",
  "",
].join("\n");

describe("artifact listings", () => {
  test("are recognized by header and artifact names", () => {
    expect(looksLikeArtifactListing(LISTING)).toBe(true);
    expect(looksLikeArtifactListing("Name\tSize\nreport\n\t1 KB")).toBe(false);
    expect(looksLikeArtifactListing("a,b\n1,2")).toBe(false);
  });

  test("pair each name with its detail line", () => {
    expect(extractArtifactListing(LISTING)).toEqual({
      rows: [
        ["Name", "Size"],
        ["wheels-linux-x86_64", "4.2 MB"],
        ["wheels-linux-aarch64", "3.78 MB"],
        ["wheels-macos-arm64", "4.63 MB"],
      ],
      hasHeader: true,
    });
  });

  test("handle CRLF pastes", () => {
    expect(extractArtifactListing(LISTING.replace(/\n/g, "\r\n"))?.rows).toHaveLength(4);
  });

  test("other text is not a listing", () => {
    expect(extractArtifactListing("a,b\n1,2")).toBeNull();
  });
});

describe("isTabularText", () => {
  test("consistent delimited lines", () => {
    expect(isTabularText("a,b\n1,2")).toBe(true);
    expect(isTabularText("a\tb\n\n1\t2\n")).toBe(true);
  });

  test("a single line is not a table", () => {
    expect(isTabularText("just one line")).toBe(false);
  });

  test("long pastes are checked line by line", () => {
    const lines = Array.from({ length: 300_000 }, (_, i) => `${i},x`);

    expect(isTabularText(lines.join("\n"))).toBe(true);
    expect(isTabularText([...lines, "1,2,3"].join("\n"))).toBe(false);
  });

  test("ragged or single-column text is not a table", () => {
    expect(isTabularText("a,b\n1,2,3")).toBe(false);
    expect(isTabularText("a\nb")).toBe(false);
  });
});

describe("parsePastedText", () => {
  test("routes artifact listings around delimiter detection", () => {
    const table = parsePastedText(LISTING);

    expect(table.columns).toEqual(["Name", "Size"]);
    expect(table.data).toHaveLength(3);
    expect(table.types).toEqual(["string", "string"]);
  });

  test("options still apply to listings", () => {
    const table = parsePastedText(LISTING, { hasHeader: false, maxRows: 2 });

    expect(table.columns).toEqual(["V1", "V2"]);
    expect(table.data).toEqual([
      ["Name", "Size"],
      ["wheels-linux-x86_64", "4.2 MB"],
    ]);
  });

  test("an explicit delimiter bypasses listing recognition", () => {
    const table = parsePastedText(LISTING, { delimiter: "\t", onWarning: () => {} });

    expect(table.columns).toEqual(["V1", "V2", "V3"]);
    expect(table.data).toHaveLength(7);
    expect(table.data[0]).toEqual(["Name ", "Size ", ""]);
    expect(table.data[1]).toEqual(["wheels-linux-x86_64", "", ""]);
  });

  test("falls back to delimited parsing", () => {
    expect(parsePastedText("x|y\n1|2").columns).toEqual(["x", "y"]);
  });
});

describe("textToCode", () => {
  test("vector output", () => {
    expect(textToCode("x|y\n1|2", "vector")).toBe("[1, 2]");
  });

  test("pandas output with render options", () => {
    expect(textToCode("x|y\n1|2", "pandas", { indent: 2 })).toBe(
      'import pandas as pd\n\ndf = pd.DataFrame({\n  "x": [1],\n  "y": [2],\n})'
    );
  });

  test("empty text renders an empty DataFrame", () => {
    expect(textToCode("", "polars")).toBe("import polars as pl\ndf = pl.DataFrame()");
  });

  test("unknown shapes throw", () => {
    expect(() => textToCode("a", "excel")).toThrow(ValidationError);
  });
});
