/**
 * Error handling for pasted-table parsing and code generation
 *
 * The inference pipeline recovers locally from messy input, so these errors
 * are reserved for caller-contract violations and I/O failures.
 */

/**
 * Base error class for all tablepaste errors
 */
export class TablePasteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "TablePasteError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid arguments: bad options, unknown output shapes
 */
export class ValidationError extends TablePasteError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends TablePasteError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * File I/O errors with the originating path and operation
 */
export class FileError extends TablePasteError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  UNKNOWN_SHAPE: 'Output shapes are "polars", "pandas", "vector" and "vector-vertical"',
  INVALID_DELIMITER: "Delimiters must be a single character such as ',', '\\t', '|' or ';'",
  UNBALANCED_QUOTES: "Check for a quote character that opens a field but never closes it",
  MISSING_FILE: "Check that the file exists, is readable, and is UTF-8 text",
  MALFORMED_OPTIONS: "Check option names and value types against ParseTableOptions",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: TablePasteError): string | undefined {
  const message = error.message.toLowerCase();

  if (message.includes("shape")) {
    return ERROR_SUGGESTIONS.UNKNOWN_SHAPE;
  }
  if (message.includes("delimiter")) {
    return ERROR_SUGGESTIONS.INVALID_DELIMITER;
  }
  if (message.includes("quote")) {
    return ERROR_SUGGESTIONS.UNBALANCED_QUOTES;
  }
  if (error instanceof FileError) {
    return ERROR_SUGGESTIONS.MISSING_FILE;
  }
  if (error instanceof ValidationError) {
    return ERROR_SUGGESTIONS.MALFORMED_OPTIONS;
  }

  return undefined;
}
