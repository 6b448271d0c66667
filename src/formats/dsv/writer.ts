/**
 * @module formats/dsv/writer
 * @description Normalizing DSV writer
 *
 * By default output uses `,` between fields and `"` for quoting, whatever
 * the input used; records always end with `\n`. A field is quoted exactly
 * when it contains the delimiter, the quote or a line break, so the output
 * reads back through the tokenizer unchanged.
 */

// =============================================================================
// IMPORTS
// =============================================================================

import { type } from "arktype";
import { ConfigError } from "../../errors";
import type { ByteSink } from "../../types";
import {
  BUFFER_SIZE,
  BYTES,
  OUTPUT_DELIMITER,
  OUTPUT_QUOTE,
  OUTPUT_TERMINATOR,
} from "./constants";
import type { DSVWriterOptions, FieldValue } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

// =============================================================================
// CLASSES - MAIN WRITER
// =============================================================================

/**
 * DSVWriter - buffered record writer over a byte sink
 *
 * Records are serialized into an in-memory block and handed to the sink
 * once the block reaches `bufferSize`. Call {@link flush} at the end.
 */
export class DSVWriter {
  private readonly capacity: number;
  private readonly delimiter: number;
  private readonly quote: number | null;
  private buffer: Uint8Array;
  private used = 0;
  private written = 0;

  constructor(
    private readonly sink: ByteSink,
    options: DSVWriterOptions = {}
  ) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ConfigError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.capacity = options.bufferSize ?? BUFFER_SIZE;
    this.delimiter = options.delimiter ?? OUTPUT_DELIMITER;
    this.quote = options.quote === undefined ? OUTPUT_QUOTE : options.quote;
    this.buffer = new Uint8Array(this.capacity);
  }

  /** Bytes handed to the sink so far */
  get bytesWritten(): number {
    return this.written;
  }

  /**
   * Serialize one record. A record with no fields writes nothing.
   */
  async writeRecord(fields: Iterable<FieldValue>): Promise<void> {
    let count = 0;
    let lastEmpty = false;

    for (const value of fields) {
      const bytes = value instanceof Uint8Array ? value : value.bytes;
      if (count > 0) {
        this.put(this.delimiter);
      }
      this.putField(bytes);
      lastEmpty = bytes.length === 0;
      count++;
    }

    if (count === 0) {
      return;
    }

    // A lone empty field would otherwise be a blank line, which readers skip.
    if (count === 1 && lastEmpty && this.quote !== null) {
      this.put(this.quote);
      this.put(this.quote);
    }
    this.put(OUTPUT_TERMINATOR);

    if (this.used >= this.capacity) {
      await this.flush();
    }
  }

  /**
   * Hand everything buffered to the sink
   */
  async flush(): Promise<void> {
    if (this.used === 0) {
      return;
    }
    const block = this.buffer.slice(0, this.used);
    this.used = 0;
    await this.sink.write(block);
    this.written += block.length;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private putField(bytes: Uint8Array): void {
    const quote = this.quote;
    if (quote === null || !needsQuoting(bytes, this.delimiter, quote)) {
      this.reserve(bytes.length);
      this.buffer.set(bytes, this.used);
      this.used += bytes.length;
      return;
    }

    this.put(quote);
    for (const byte of bytes) {
      if (byte === quote) {
        this.put(quote);
      }
      this.put(byte);
    }
    this.put(quote);
  }

  private put(byte: number): void {
    this.reserve(1);
    this.buffer[this.used++] = byte;
  }

  private reserve(extra: number): void {
    const needed = this.used + extra;
    if (needed <= this.buffer.length) {
      return;
    }
    let size = this.buffer.length * 2;
    while (size < needed) {
      size *= 2;
    }
    const grown = new Uint8Array(size);
    grown.set(this.buffer.subarray(0, this.used));
    this.buffer = grown;
  }
}

/**
 * Whether a field must be quoted for the given delimiter and quote
 */
export function needsQuoting(
  bytes: Uint8Array,
  delimiter: number = OUTPUT_DELIMITER,
  quote: number = OUTPUT_QUOTE
): boolean {
  for (const byte of bytes) {
    if (
      byte === delimiter ||
      byte === quote ||
      byte === BYTES.LF ||
      byte === BYTES.CR
    ) {
      return true;
    }
  }
  return false;
}
