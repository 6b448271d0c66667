/**
 * ByteRecord - one row of byte-string fields
 *
 * Fields are stored back to back in a single buffer with an array of end
 * offsets, so reading a field is a `subarray` and never copies.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

export class ByteRecord implements Iterable<Uint8Array> {
  constructor(
    private readonly bytes: Uint8Array,
    private readonly ends: readonly number[]
  ) {}

  /**
   * Build a record from separate fields (copies them)
   */
  static from(fields: readonly (string | Uint8Array)[]): ByteRecord {
    const encoded = fields.map((field) =>
      typeof field === "string" ? encoder.encode(field) : field
    );
    const total = encoded.reduce((sum, field) => sum + field.length, 0);
    const bytes = new Uint8Array(total);
    const ends: number[] = [];
    let offset = 0;
    for (const field of encoded) {
      bytes.set(field, offset);
      offset += field.length;
      ends.push(offset);
    }
    return new ByteRecord(bytes, ends);
  }

  /** Number of fields */
  get length(): number {
    return this.ends.length;
  }

  /**
   * Field at `index` as a view over the record's storage
   */
  field(index: number): Uint8Array {
    const end = this.ends[index];
    if (end === undefined) {
      throw new RangeError(`field index ${index} out of range (record has ${this.length})`);
    }
    const start = index === 0 ? 0 : (this.ends[index - 1] ?? 0);
    return this.bytes.subarray(start, end);
  }

  *[Symbol.iterator](): Iterator<Uint8Array> {
    let start = 0;
    for (const end of this.ends) {
      yield this.bytes.subarray(start, end);
      start = end;
    }
  }

  /**
   * Fields decoded as UTF-8 with replacement characters (for tests and logs)
   */
  toStrings(): string[] {
    return Array.from(this, (field) => decoder.decode(field));
  }
}
