/**
 * File writing operations using Effect Platform
 *
 * All Effect complexity is hidden behind Promise-based APIs.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { logDebug } from "../logging";
import type { ByteSink, WriteOptions } from "../types";
import { runEffect, runWithPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle extends ByteSink {
  /** Path the handle writes to */
  readonly path: string;
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is opened before the callback runs, so an unwritable path fails
 * early, and is closed by Effect's scoped resource management however the
 * callback ends. Errors thrown by the callback reach the caller unchanged.
 *
 * @param path - File path to open (created if missing, truncated by default)
 * @param callback - Function that receives write handle and returns result
 * @param options - Open flag and permission bits
 * @returns Promise resolving to callback's return value
 * @throws {FileError} When the file cannot be opened or a write fails
 *
 * @example
 * ```typescript
 * await openForWriting("rejected.csv", async (handle) => {
 *   const writer = new DSVWriter(handle);
 *   await writer.writeRecord(ByteRecord.from(["a", "b"]));
 *   await writer.flush();
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {}
): Promise<T> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(path, { flag: options.flag ?? "w", mode: options.mode ?? 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));
    logDebug("opened output file", { path });

    const handle: FileWriteHandle = {
      path,
      write: async (content: Uint8Array): Promise<void> => {
        try {
          await runEffect(file.writeAll(content));
        } catch (error) {
          throw FileError.fromSystemError("write", path, error);
        }
      },
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runWithPlatform(program.pipe(Effect.scoped));
}
