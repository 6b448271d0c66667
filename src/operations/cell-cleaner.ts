/**
 * Per-cell normalization: null blanking, whitespace trimming, newline folding
 *
 * Everything works on bytes, so any ASCII-compatible encoding passes
 * through intact. Only the null pattern looks at text, via a lossy UTF-8
 * decode of the field.
 *
 * @since v0.1.0
 */

import { ConfigError } from "../errors";
import { BYTES } from "../formats/dsv/constants";
import type { Cell } from "../formats/dsv/types";
import { containsByte } from "../formats/dsv/utils";
import type { CellCleanerOptions } from "./types";

const decoder = new TextDecoder("utf-8");
const EMPTY = new Uint8Array(0);
const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_FLAGS = new Set(["i", "m", "s"]);

/**
 * Stateless cell transformer, configured once per run.
 *
 * Steps always run in the same order: null pattern, trim, newlines. Each
 * step sees the previous step's output.
 */
export class CellCleaner {
  private readonly nullPattern: RegExp | undefined;
  private readonly replaceNewlines: boolean;
  private readonly trimWhitespace: boolean;

  constructor(options: CellCleanerOptions = {}) {
    this.nullPattern = options.nullPattern;
    this.replaceNewlines = options.replaceNewlines ?? false;
    this.trimWhitespace = options.trimWhitespace ?? false;
  }

  /** True when no step is enabled and every cell passes through as is */
  get isNoop(): boolean {
    return this.nullPattern === undefined && !this.replaceNewlines && !this.trimWhitespace;
  }

  /**
   * Clean one field. Never changes the number of fields in a record.
   */
  clean(field: Uint8Array): Cell {
    let bytes = field;
    let owned = false;

    if (this.nullPattern !== undefined && this.nullPattern.test(decoder.decode(bytes))) {
      bytes = EMPTY;
      owned = true;
    }

    if (this.trimWhitespace) {
      bytes = trimAsciiWhitespace(bytes);
    }

    if (
      this.replaceNewlines &&
      (containsByte(bytes, BYTES.LF) || containsByte(bytes, BYTES.CR))
    ) {
      bytes = foldNewlines(bytes);
      owned = true;
    }

    return owned ? { kind: "owned", bytes } : { kind: "borrowed", bytes };
  }

  /**
   * Clean every field of a record, in order
   */
  *cleanAll(fields: Iterable<Uint8Array>): Generator<Cell> {
    for (const field of fields) {
      yield this.clean(field);
    }
  }
}

/**
 * Compile a user-supplied null pattern so that it must match a whole field.
 *
 * A leading inline flag group such as `(?i)` becomes RegExp flags.
 *
 * @throws {ConfigError} for unsupported flags or invalid syntax
 */
export function compileNullPattern(source: string): RegExp {
  let body = source;
  let flags = "";

  const inline = INLINE_FLAGS.exec(source);
  if (inline !== null) {
    const requested = inline[1] ?? "";
    for (const flag of requested) {
      if (!SUPPORTED_FLAGS.has(flag)) {
        throw new ConfigError(
          `can't compile regular expression: unsupported inline flag '${flag}'`,
          source
        );
      }
      if (!flags.includes(flag)) flags += flag;
    }
    body = source.slice(inline[0].length);
  }

  try {
    return new RegExp(`^(?:${body})$`, flags);
  } catch (error) {
    throw new ConfigError("can't compile regular expression", source, { cause: error });
  }
}

/**
 * Strip leading and trailing ASCII whitespace (space, tab, LF, FF, CR).
 * Returns a view over the input, not a copy.
 */
export function trimAsciiWhitespace(bytes: Uint8Array): Uint8Array {
  let start = 0;
  let end = bytes.length;
  while (start < end && isAsciiWhitespace(bytes[start] ?? 0)) start++;
  while (end > start && isAsciiWhitespace(bytes[end - 1] ?? 0)) end--;
  return start === 0 && end === bytes.length ? bytes : bytes.subarray(start, end);
}

/**
 * Replace every CRLF, lone LF and lone CR with a single space
 */
export function foldNewlines(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(bytes.length);
  let used = 0;
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i] ?? 0;
    if (byte === BYTES.CR) {
      if (bytes[i + 1] === BYTES.LF) i++;
      out[used++] = BYTES.SPACE;
    } else if (byte === BYTES.LF) {
      out[used++] = BYTES.SPACE;
    } else {
      out[used++] = byte;
    }
  }
  return out.subarray(0, used);
}

function isAsciiWhitespace(byte: number): boolean {
  return (
    byte === BYTES.SPACE ||
    byte === BYTES.TAB ||
    byte === BYTES.LF ||
    byte === BYTES.FF ||
    byte === BYTES.CR
  );
}
