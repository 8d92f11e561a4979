/**
 * CSV State Machine Module
 *
 * Implements RFC 4180 compliant CSV parsing using a state machine approach.
 * Handles quoted fields, escaped quotes, and multi-line fields.
 */

import { DSVParseError } from "../../errors";
import { DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import { CSVParseState, type CSVRowOptions, type DSVRecordSpan } from "./types";

/**
 * Character-level scanner shared by single-row and whole-text parsing
 *
 * When `newlineEndsRecord` is set, a "\n" outside quotes closes the current
 * record; otherwise newlines are ordinary field content.
 */
class RecordScanner {
  private readonly records: DSVRecordSpan[] = [];
  private fields: string[] = [];
  private currentField = "";
  private state = CSVParseState.FIELD_START;
  private line = 1;
  private recordStartLine = 1;

  constructor(
    private readonly delimiter: string,
    private readonly quote: string,
    private readonly escapeChar: string,
    private readonly newlineEndsRecord: boolean
  ) {}

  scan(text: string): DSVRecordSpan[] {
    let i = 0;

    while (i < text.length) {
      const char = text.charAt(i);
      const nextChar = text.charAt(i + 1);

      if (char === "\n" && this.newlineEndsRecord && this.state !== CSVParseState.QUOTED_FIELD) {
        this.endRecord(false);
        this.line++;
        this.recordStartLine = this.line;
        i++;
        continue;
      }
      if (char === "\n") this.line++;

      switch (this.state) {
        case CSVParseState.FIELD_START:
          if (char === this.quote) {
            this.state = CSVParseState.QUOTED_FIELD;
          } else if (char === this.delimiter) {
            // Empty field
            this.fields.push("");
          } else {
            this.currentField = char;
            this.state = CSVParseState.UNQUOTED_FIELD;
          }
          i++;
          break;

        case CSVParseState.UNQUOTED_FIELD:
          if (char === this.delimiter) {
            this.pushField();
          } else {
            this.currentField += char;
          }
          i++;
          break;

        case CSVParseState.QUOTED_FIELD:
          if (char === this.quote) {
            if (this.escapeChar === this.quote && nextChar === this.quote) {
              // Escaped quote (doubled)
              this.currentField += this.quote;
              i += 2;
            } else {
              this.state = CSVParseState.QUOTE_IN_QUOTED;
              i++;
            }
          } else {
            this.currentField += char;
            i++;
          }
          break;

        case CSVParseState.QUOTE_IN_QUOTED:
          if (char === this.delimiter) {
            this.pushField();
          } else if (char === this.quote && this.escapeChar === this.quote) {
            this.currentField += this.quote;
            this.state = CSVParseState.QUOTED_FIELD;
          } else {
            // Characters after a closing quote are kept as part of the field
            this.currentField += char;
            this.state = CSVParseState.UNQUOTED_FIELD;
          }
          i++;
          break;
      }
    }

    const unclosed = this.state === CSVParseState.QUOTED_FIELD;
    this.endRecord(unclosed);
    return this.records;
  }

  private pushField(): void {
    this.fields.push(this.currentField);
    this.currentField = "";
    this.state = CSVParseState.FIELD_START;
  }

  private endRecord(unclosedQuote: boolean): void {
    if (this.state !== CSVParseState.FIELD_START || this.fields.length > 0) {
      // A record ending right after a delimiter still has an empty final field
      this.fields.push(this.currentField);
    }
    this.records.push({
      fields: this.fields,
      lineNumber: this.recordStartLine,
      unclosedQuote,
    });
    this.fields = [];
    this.currentField = "";
    this.state = CSVParseState.FIELD_START;
  }
}

/**
 * Parse CSV row with proper RFC 4180 state machine
 * Handles quoted fields, escaped quotes, and multi-line fields
 *
 * @param line - CSV line to parse
 * @param delimiter - Field delimiter
 * @returns Array of parsed fields
 * @throws {DSVParseError} On an unclosed quote, unless `unclosedQuote` is "keep"
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  options: CSVRowOptions = {}
): string[] {
  const scanner = new RecordScanner(
    delimiter,
    options.quote ?? DEFAULT_QUOTE,
    options.escapeChar ?? DEFAULT_ESCAPE,
    false
  );
  const [record] = scanner.scan(line);
  if (!record) return [];

  if (record.unclosedQuote && (options.unclosedQuote ?? "error") === "error") {
    throw new DSVParseError("Unclosed quote in CSV field", undefined, undefined, line);
  }
  return record.fields;
}

/**
 * Split normalized text into records
 *
 * Quoted fields may span lines. Empty lines produce no record. Input that
 * ends inside a quoted field yields a final record flagged `unclosedQuote`.
 *
 * @param text - Text with "\n" line endings
 * @param delimiter - Field delimiter
 */
export function splitRecords(
  text: string,
  delimiter: string,
  options: Pick<CSVRowOptions, "quote" | "escapeChar"> = {}
): DSVRecordSpan[] {
  const scanner = new RecordScanner(
    delimiter,
    options.quote ?? DEFAULT_QUOTE,
    options.escapeChar ?? DEFAULT_ESCAPE,
    true
  );
  return scanner.scan(text).filter((record) => record.fields.length > 0);
}
