/**
 * DSV Format Constants
 *
 * Byte values and buffer sizes shared by the tokenizer and the writer.
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Input chunk and output block size (256 KiB)
 */
export const BUFFER_SIZE = 256 * 1024;

/**
 * Byte values used by the tokenizer and writer
 */
export const BYTES = {
  TAB: 0x09,
  LF: 0x0a,
  FF: 0x0c,
  CR: 0x0d,
  SPACE: 0x20,
  QUOTE: 0x22,
  COMMA: 0x2c,
} as const;

/**
 * Default reader delimiter and quote specifiers
 */
export const DEFAULT_DELIMITER = ",";
export const DEFAULT_QUOTE = '"';

/**
 * Named character specifiers accepted on the command line
 */
export const CHAR_ALIASES: ReadonlyMap<string, number | null> = new Map<string, number | null>([
  ["\\t", BYTES.TAB],
  ["tab", BYTES.TAB],
  ["none", null],
]);

/**
 * Default output convention
 */
export const OUTPUT_DELIMITER = BYTES.COMMA;
export const OUTPUT_QUOTE = BYTES.QUOTE;
export const OUTPUT_TERMINATOR = BYTES.LF;
