/**
 * DSV Format Type Definitions
 *
 * Types for the byte-level tokenizer and the normalizing writer.
 */

// =============================================================================
// TYPES
// =============================================================================

/**
 * Tokenizer states. Mirrors a classic CSV state machine, working on bytes.
 */
export enum CSVParseState {
  RECORD_START,
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * One field value as handed to the writer.
 *
 * `borrowed` cells are views over the original record's storage; `owned`
 * cells were rewritten by a cleaning step. The writer treats both alike.
 */
export type Cell =
  | { readonly kind: "borrowed"; readonly bytes: Uint8Array }
  | { readonly kind: "owned"; readonly bytes: Uint8Array };

/**
 * Anything the writer accepts as a field
 */
export type FieldValue = Uint8Array | Cell;

/**
 * Tokenizer configuration, already resolved to bytes
 */
export interface DSVReaderOptions {
  /** Field delimiter byte (default: `,`) */
  delimiter?: number;
  /** Quote byte, or `null` to disable quote processing (default: `"`) */
  quote?: number | null;
}

/**
 * Writer configuration
 */
export interface DSVWriterOptions {
  /** Bytes buffered before a write to the sink (default: BUFFER_SIZE) */
  bufferSize?: number;
  /** Field delimiter byte (default: `,`) */
  delimiter?: number;
  /** Quote byte, or `null` to write every field bare (default: `"`) */
  quote?: number | null;
}
