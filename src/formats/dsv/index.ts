/**
 * @module formats/dsv
 * @description Delimiter-separated values: byte tokenizer and normalizing writer
 *
 * @example Re-serialize a pipe-separated stream as CSV
 * ```typescript
 * import { DSVParser, DSVWriter, parseCharSpecifier } from './formats/dsv';
 *
 * const parser = new DSVParser({ delimiter: parseCharSpecifier("|") ?? 0x2c });
 * const writer = new DSVWriter(sink);
 * for await (const record of parser.parse(source)) {
 *   await writer.writeRecord(record);
 * }
 * await writer.flush();
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type { Cell, DSVReaderOptions, DSVWriterOptions, FieldValue } from "./types";
export { CSVParseState } from "./types";

// =============================================================================
// RE-EXPORTS - MAIN CLASSES
// =============================================================================

export { DSVParser } from "./parser";
export { ByteRecord } from "./record";
export { ByteTokenizer } from "./state-machine";
export { DSVWriter, needsQuoting } from "./writer";

// =============================================================================
// RE-EXPORTS - UTILITIES
// =============================================================================

export { BUFFER_SIZE, BYTES, DEFAULT_DELIMITER, DEFAULT_QUOTE } from "./constants";
export { containsByte, parseCharSpecifier } from "./utils";
export { DSVReaderOptionsSchema, DSVWriterOptionsSchema } from "./validation";
