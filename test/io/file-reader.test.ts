/**
 * Tests for file input through the Effect platform FileSystem
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { exists, readTableFile, readToString } from "../../src/io/file-reader";

let fixturesDir = "";
const fixture = (name: string) => join(fixturesDir, name);

beforeAll(() => {
  fixturesDir = mkdtempSync(join(tmpdir(), "tablepaste-"));

  writeFileSync(fixture("prices.csv"), "item,price\nApple,1.25\nPear,0.9\n");
  writeFileSync(fixture("crlf.tsv"), "\uFEFFid\tok\r\n1\tyes\r\n2\tno\r\n");
  writeFileSync(fixture("empty.txt"), "");
  mkdirSync(fixture("a-directory"));
});

afterAll(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

describe("exists", () => {
  test("true for regular files", async () => {
    expect(await exists(fixture("prices.csv"))).toBe(true);
    expect(await exists(fixture("empty.txt"))).toBe(true);
  });

  test("false for missing paths and directories", async () => {
    expect(await exists(fixture("nope.csv"))).toBe(false);
    expect(await exists(fixture("a-directory"))).toBe(false);
  });
});

describe("readToString", () => {
  test("reads file content", async () => {
    expect(await readToString(fixture("prices.csv"))).toBe("item,price\nApple,1.25\nPear,0.9\n");
  });

  test("missing files raise FileError", async () => {
    await expect(readToString(fixture("nope.csv"))).rejects.toBeInstanceOf(FileError);
    await expect(readToString(fixture("nope.csv"))).rejects.toThrow(
      `File not found or not a regular file: ${fixture("nope.csv")}`
    );
  });

  test("directories are refused before reading", async () => {
    await expect(readToString(fixture("a-directory"))).rejects.toThrow(
      /^File not found or not a regular file: /
    );
  });

  test("files over the size cap are refused", async () => {
    await expect(readToString(fixture("prices.csv"), { maxFileSize: 5 })).rejects.toThrow(
      /File too large/
    );
  });

  test("invalid paths and options raise FileError", async () => {
    await expect(readToString("")).rejects.toBeInstanceOf(FileError);
    await expect(readToString(fixture("prices.csv"), { maxFileSize: -1 })).rejects.toBeInstanceOf(
      FileError
    );
  });
});

describe("readTableFile", () => {
  test("parses a delimited file", async () => {
    const table = await readTableFile(fixture("prices.csv"));

    expect(table.columns).toEqual(["item", "price"]);
    expect(table.types).toEqual(["string", "float"]);
  });

  test("strips the BOM and CRLF endings", async () => {
    const table = await readTableFile(fixture("crlf.tsv"));

    expect(table.columns).toEqual(["id", "ok"]);
    expect(table.data).toEqual([
      ["1", "yes"],
      ["2", "no"],
    ]);
    expect(table.types).toEqual(["integer", "boolean"]);
  });

  test("parse options pass through", async () => {
    const table = await readTableFile(fixture("prices.csv"), { maxRows: 1 });
    expect(table.data).toEqual([["Apple", "1.25"]]);
  });

  test("an empty file is the empty table", async () => {
    const table = await readTableFile(fixture("empty.txt"));
    expect(table.columns).toEqual([]);
  });
});
