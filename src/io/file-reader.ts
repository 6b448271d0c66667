/**
 * File reading through the Effect platform FileSystem
 *
 * All Effect plumbing stays behind Promise and async-iterable APIs.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import { BUFFER_SIZE } from "../formats/dsv/constants";
import { logDebug } from "../logging";
import type { ByteSource, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";
import { readChunks } from "./stream-utils";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: BUFFER_SIZE,
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation or the stat call fails
 */
export async function exists(path: string): Promise<boolean> {
  return (await fileType(validatePath(path))) === "File";
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the file does not exist, is a directory, or cannot
 * be opened
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const kind = await fileType(validatedPath);
  if (kind === undefined) {
    throw new FileError(`cannot open ${validatedPath} (no such file)`, validatedPath, "open");
  }
  if (kind === "Directory") {
    throw new FileError(
      `cannot open ${validatedPath} (${FileError.suggestionFor("EISDIR") ?? "is a directory"})`,
      validatedPath,
      "open"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  try {
    const stream = await runWithPlatform(program);
    logDebug("opened input file", { path: validatedPath, chunkSize: mergedOptions.bufferSize });
    return stream;
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }
}

/**
 * Open a file as a {@link ByteSource}
 *
 * Read failures surface from the iterator as {@link FileError}.
 */
export async function openFileSource(
  path: string,
  options: FileReaderOptions = {}
): Promise<ByteSource> {
  const stream = await createStream(path, options);
  return readChunks(stream, (error) => FileError.fromSystemError("read", path, error));
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Type of the entry at `path`, or undefined when nothing is there
 */
async function fileType(path: string): Promise<FileSystem.File.Type | undefined> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return undefined;

    const info = yield* fs.stat(path);
    return info.type;
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", path, error);
  }
}

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
