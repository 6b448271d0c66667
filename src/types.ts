/**
 * Shared types for byte I/O
 */

import { type } from "arktype";

/**
 * A source of raw input bytes, chosen once before the main loop.
 *
 * Files and standard input both reduce to this, so nothing downstream
 * branches on where the bytes come from.
 */
export type ByteSource = AsyncIterable<Uint8Array>;

/**
 * A destination for serialized output bytes
 */
export interface ByteSink {
  /** Write all of `chunk`; resolves once the sink has accepted it */
  write(chunk: Uint8Array): Promise<void>;
}

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Chunk size for streaming reads (default: BUFFER_SIZE) */
  readonly bufferSize?: number;
}

/**
 * File writing configuration options
 */
export interface WriteOptions {
  /** Create or truncate (default) versus append */
  readonly flag?: "w" | "a";
  /** Permission bits for newly created files (default: 0o644) */
  readonly mode?: number;
}

/**
 * File path validation schema
 *
 * Paths are handed to the platform file system unchanged; this only rejects
 * values no file system accepts.
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without null characters" });
  }
  return true;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number.integer>=1024",
});
