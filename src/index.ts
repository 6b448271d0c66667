/**
 * rowscrub - streaming cleanup of delimited text tables
 *
 * Validates every row against the header's width, normalizes cells, and
 * diverts malformed rows, in one pass and constant memory.
 */

// CLI entry point
export { type CliIO, run } from "./cli";
export { configFromEnv, loadConfig, mergeConfig, type RowscrubConfig } from "./cli/config";
export { formatBytes, formatSummary } from "./cli/summary";
// Error types
export {
  ConfigError,
  exitCodeFor,
  FileError,
  formatErrorChain,
  RowscrubError,
  StreamError,
  TooManyBadRowsError,
} from "./errors";
// DSV format
export {
  ByteRecord,
  type Cell,
  DSVParser,
  type DSVReaderOptions,
  DSVWriter,
  type FieldValue,
  parseCharSpecifier,
} from "./formats/dsv";
// File I/O infrastructure
export { exists, openFileSource } from "./io/file-reader";
export { type FileWriteHandle, openForWriting } from "./io/file-writer";
export { fromBytes, fromReadable, MemorySink, WritableSink } from "./io/stream-utils";
// Scrubbing operations
export * from "./operations";
// Core types
export type { ByteSink, ByteSource } from "./types";
