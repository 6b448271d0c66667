/**
 * CSV State Machine Module
 *
 * Incremental byte tokenizer. Chunks may split a record (or a quoted field)
 * anywhere; the machine keeps the partial record and resumes on the next
 * chunk. It never rejects input: odd quoting degrades to literal bytes and
 * records of any width are returned for the caller to classify.
 */

import { BYTES } from "./constants";
import { ByteRecord } from "./record";
import { CSVParseState, type DSVReaderOptions } from "./types";

const INITIAL_CAPACITY = 1024;

export class ByteTokenizer {
  private readonly delimiter: number;
  private readonly quote: number | null;

  private state = CSVParseState.RECORD_START;
  private buffer = new Uint8Array(INITIAL_CAPACITY);
  private used = 0;
  private ends: number[] = [];

  constructor(options: DSVReaderOptions = {}) {
    this.delimiter = options.delimiter ?? BYTES.COMMA;
    this.quote = options.quote === undefined ? BYTES.QUOTE : options.quote;
  }

  /**
   * Feed one chunk, returning every record it completes
   */
  push(chunk: Uint8Array): ByteRecord[] {
    const records: ByteRecord[] = [];
    const delimiter = this.delimiter;
    const quote = this.quote;

    for (let i = 0; i < chunk.length; i++) {
      const byte = chunk[i] ?? 0;
      const terminator = byte === BYTES.LF || byte === BYTES.CR;

      switch (this.state) {
        case CSVParseState.RECORD_START:
          // Blank lines, and the LF of a CRLF, never start a record.
          if (terminator) break;
          this.state = CSVParseState.FIELD_START;
          i--;
          break;

        case CSVParseState.FIELD_START:
          if (byte === quote) {
            this.state = CSVParseState.QUOTED_FIELD;
          } else if (byte === delimiter) {
            this.endField();
          } else if (terminator) {
            records.push(this.endRecord());
          } else {
            this.append(byte);
            this.state = CSVParseState.UNQUOTED_FIELD;
          }
          break;

        case CSVParseState.UNQUOTED_FIELD:
          if (byte === delimiter) {
            this.endField();
            this.state = CSVParseState.FIELD_START;
          } else if (terminator) {
            records.push(this.endRecord());
          } else {
            this.append(byte);
          }
          break;

        case CSVParseState.QUOTED_FIELD:
          if (byte === quote) {
            this.state = CSVParseState.QUOTE_IN_QUOTED;
          } else {
            this.append(byte);
          }
          break;

        case CSVParseState.QUOTE_IN_QUOTED:
          if (byte === quote) {
            // Doubled quote inside a quoted field
            this.append(byte);
            this.state = CSVParseState.QUOTED_FIELD;
          } else if (byte === delimiter) {
            this.endField();
            this.state = CSVParseState.FIELD_START;
          } else if (terminator) {
            records.push(this.endRecord());
          } else {
            // Stray closing quote: keep going unquoted
            this.append(byte);
            this.state = CSVParseState.UNQUOTED_FIELD;
          }
          break;
      }
    }

    return records;
  }

  /**
   * Signal end of input, returning the unterminated final record if any
   */
  finish(): ByteRecord | undefined {
    if (this.state === CSVParseState.RECORD_START) {
      return undefined;
    }
    return this.endRecord();
  }

  private append(byte: number): void {
    if (this.used === this.buffer.length) {
      const grown = new Uint8Array(this.buffer.length * 2);
      grown.set(this.buffer);
      this.buffer = grown;
    }
    this.buffer[this.used++] = byte;
  }

  private endField(): void {
    this.ends.push(this.used);
  }

  private endRecord(): ByteRecord {
    this.endField();
    const record = new ByteRecord(this.buffer.slice(0, this.used), this.ends);
    this.used = 0;
    this.ends = [];
    this.state = CSVParseState.RECORD_START;
    return record;
  }
}
