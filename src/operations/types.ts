/**
 * Shared types for the scrubbing operations
 *
 * @since v0.1.0
 */

import type { FieldValue } from "../formats/dsv/types";

/**
 * Options for the per-cell cleaner
 */
export interface CellCleanerOptions {
  /** Blank fields this matches in full (see compileNullPattern) */
  nullPattern?: RegExp;

  /** Replace CR, LF and CRLF inside values with a space */
  replaceNewlines?: boolean;

  /** Strip ASCII whitespace from both ends of every value */
  trimWhitespace?: boolean;
}

/**
 * Options for a whole scrub run
 */
export interface ScrubOptions extends CellCleanerOptions {
  /** Rewrite header names with the Uniquifier */
  cleanColumnNames?: boolean;

  /** Canonical names of columns that must not be empty after cleaning */
  dropRowIfNull?: readonly string[];
}

/**
 * Where records go. The DSV writer is the usual implementation.
 */
export interface RecordSink {
  writeRecord(fields: Iterable<FieldValue>): Promise<void>;
  flush(): Promise<void>;
}

/**
 * Row counts for one run. The header counts as the first row.
 */
export interface RunCounters {
  rows: number;
  badRows: number;
}

/**
 * Which per-row path the pipeline took
 */
export type ScrubPath = "fast" | "clean" | "clean-and-check";

/**
 * Outcome of a completed scrub loop
 */
export interface ScrubResult extends RunCounters {
  /** Canonical header written to the output */
  readonly header: readonly string[];
  /** Path chosen for data rows */
  readonly path: ScrubPath;
}
