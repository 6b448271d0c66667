/**
 * ScrubProcessor - validate row widths, clean cells, divert bad rows
 *
 * The first record is the header and fixes the expected width. Every later
 * record is either written (possibly cleaned) to the output or counted as
 * bad and, if a bad-row sink was given, written there exactly as it was
 * read.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

import { ByteRecord } from "../formats/dsv/record";
import { logDebug, logWarning } from "../logging";
import { CellCleaner } from "./cell-cleaner";
import type { RecordSink, RunCounters, ScrubOptions, ScrubPath, ScrubResult } from "./types";
import { Uniquifier } from "./uniquifier";

const encoder = new TextEncoder();

/**
 * Row pipeline over a stream of records
 *
 * @example
 * ```typescript
 * const processor = new ScrubProcessor({ trimWhitespace: true });
 * const result = await processor.process(parser.parse(source), writer, badRowWriter);
 * enforceQualityGate(result);
 * ```
 */
export class ScrubProcessor {
  private readonly cleaner: CellCleaner;
  private readonly requiredColumns: readonly string[];
  private readonly state: RunCounters = { rows: 1, badRows: 0 };

  constructor(private readonly options: ScrubOptions = {}) {
    this.cleaner = new CellCleaner(options);
    this.requiredColumns = options.dropRowIfNull ?? [];
  }

  /** Live counters; `rows` includes the header */
  get counters(): Readonly<RunCounters> {
    return this.state;
  }

  /**
   * Path data rows will take. The fast path copies records through
   * untouched and is only possible when nothing needs cleaning or checking.
   */
  get path(): ScrubPath {
    if (this.requiredColumns.length > 0) return "clean-and-check";
    return this.cleaner.isNoop ? "fast" : "clean";
  }

  /**
   * Run the pipeline to the end of `records`, then flush both sinks.
   *
   * Counters start over on every call. If a sink fails, `records` is closed
   * before the error propagates.
   */
  async process(
    records: AsyncIterable<ByteRecord>,
    output: RecordSink,
    badRows?: RecordSink
  ): Promise<ScrubResult> {
    this.state.rows = 1;
    this.state.badRows = 0;

    const iterator = records[Symbol.asyncIterator]();
    try {
      return await this.drain(iterator, output, badRows);
    } finally {
      await iterator.return?.();
    }
  }

  private async drain(
    iterator: AsyncIterator<ByteRecord>,
    output: RecordSink,
    badRows: RecordSink | undefined
  ): Promise<ScrubResult> {
    const first = await iterator.next();
    const header = this.canonicalHeader(first.done === true ? ByteRecord.from([]) : first.value);

    await output.writeRecord(header);

    const expectedColumns = header.length;
    const required = this.requiredMask(header);
    const path = this.path;
    logDebug("scrubbing rows", { expectedColumns, path });

    for (let next = await iterator.next(); next.done !== true; next = await iterator.next()) {
      const record = next.value;
      this.state.rows++;

      if (record.length !== expectedColumns) {
        await this.reject(record, badRows);
        continue;
      }

      if (path === "fast") {
        await output.writeRecord(record);
        continue;
      }

      const cleaned = this.cleaner.cleanAll(record);
      if (path === "clean") {
        await output.writeRecord(cleaned);
        continue;
      }

      const row = Array.from(cleaned);
      if (row.some((cell, index) => required[index] === true && cell.bytes.length === 0)) {
        await this.reject(record, badRows);
        continue;
      }
      await output.writeRecord(row);
    }

    await output.flush();
    await badRows?.flush();

    return {
      rows: this.state.rows,
      badRows: this.state.badRows,
      header: header.toStrings(),
      path,
    };
  }

  private async reject(record: ByteRecord, badRows: RecordSink | undefined): Promise<void> {
    this.state.badRows++;
    await badRows?.writeRecord(record);
  }

  private canonicalHeader(raw: ByteRecord): ByteRecord {
    if (this.options.cleanColumnNames !== true) {
      return raw;
    }
    const uniquifier = new Uniquifier();
    return ByteRecord.from(Array.from(raw, (name) => uniquifier.uniqueIdFor(name)));
  }

  private requiredMask(header: ByteRecord): readonly boolean[] {
    const wanted = this.requiredColumns.map((name) => encoder.encode(name));
    const mask = Array.from(header, (name) => wanted.some((required) => bytesEqual(required, name)));

    for (const [index, name] of this.requiredColumns.entries()) {
      const bytes = wanted[index];
      if (bytes !== undefined && !Array.from(header).some((column) => bytesEqual(bytes, column))) {
        logWarning("required column not found in header", { column: name });
      }
    }

    return mask;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
