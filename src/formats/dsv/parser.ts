/**
 * @module formats/dsv/parser
 * @description Streaming DSV reader over a byte source
 *
 * Pulls chunks from a {@link ByteSource}, feeds them to the byte tokenizer
 * and yields records one at a time. Records are never validated here; short
 * and long rows come through as they are.
 */

import { type } from "arktype";
import { ConfigError } from "../../errors";
import type { ByteSource } from "../../types";
import { BYTES } from "./constants";
import type { ByteRecord } from "./record";
import { ByteTokenizer } from "./state-machine";
import type { DSVReaderOptions } from "./types";
import { DSVReaderOptionsSchema } from "./validation";

/**
 * DSVParser - pull-based record reader
 *
 * @example
 * ```typescript
 * const parser = new DSVParser({ delimiter: 0x7c });
 * for await (const record of parser.parse(source)) {
 *   console.log(record.length, parser.bytesRead);
 * }
 * ```
 */
export class DSVParser {
  private readonly options: Required<DSVReaderOptions>;
  private consumed = 0;

  constructor(options: DSVReaderOptions = {}) {
    const validation = DSVReaderOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ConfigError(`Invalid DSV reader options: ${validation.summary}`);
    }

    this.options = {
      delimiter: options.delimiter ?? BYTES.COMMA,
      quote: options.quote === undefined ? BYTES.QUOTE : options.quote,
    };
  }

  /** Input bytes consumed so far */
  get bytesRead(): number {
    return this.consumed;
  }

  /**
   * Yield every record in `source`, in order
   */
  async *parse(source: ByteSource): AsyncGenerator<ByteRecord> {
    const tokenizer = new ByteTokenizer(this.options);

    for await (const chunk of source) {
      this.consumed += chunk.length;
      yield* tokenizer.push(chunk);
    }

    const last = tokenizer.finish();
    if (last !== undefined) {
      yield last;
    }
  }
}
