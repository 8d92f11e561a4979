/**
 * File input for pasted-table parsing
 *
 * Reads saved clipboard dumps and delimited files through the Effect
 * platform FileSystem, then hands the text to the same pipeline used for
 * pasted content.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError } from "../errors";
import { MAX_FILE_SIZE } from "../formats/dsv/constants";
import { parsePastedText } from "../sources/pasted-text";
import {
  FilePathSchema,
  type FileReaderOptions,
  FileReaderOptionsSchema,
  type ParsedTable,
  type ParseTableOptions,
} from "../types";

/**
 * Run a FileSystem program on the Node platform layer
 */
function runOnPlatform<A, E>(program: Effect.Effect<A, E, FileSystem.FileSystem>): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
}

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runOnPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read a whole UTF-8 file, refusing files above the size cap
 *
 * @throws {FileError} If the file is missing, unreadable or too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const maxFileSize = mergeOptions(options).maxFileSize;

  if (!(await exists(validatedPath))) {
    throw new FileError(
      `File not found or not a regular file: ${validatedPath}`,
      validatedPath,
      "stat"
    );
  }

  const sizeProgram = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  let size: number;
  try {
    size = await runOnPlatform(sizeProgram);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }

  if (size > maxFileSize) {
    throw new FileError(
      `File too large: ${size} bytes exceeds limit of ${maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }

  const readProgram = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  try {
    return await runOnPlatform(readProgram);
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Read a file and parse its contents as pasted text
 *
 * @example
 * ```typescript
 * const table = await readTableFile("prices.tsv", { maxRows: 100 });
 * console.log(render(table, "polars"));
 * ```
 */
export async function readTableFile(
  path: string,
  options: ParseTableOptions & FileReaderOptions = {}
): Promise<ParsedTable> {
  const text = await readToString(path, options);
  return parsePastedText(text, options);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType
 * Maintains FileError interface contract for callers
 */
function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "stat");
  }
  return result;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const result = FileReaderOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${result.summary}`, "", "read");
  }
  return { maxFileSize: options.maxFileSize ?? MAX_FILE_SIZE };
}
