/**
 * Table scrubbing operations
 *
 * @since v0.1.0
 */

export { CellCleaner, compileNullPattern, foldNewlines, trimAsciiWhitespace } from "./cell-cleaner";
export { BAD_ROW_DIVISOR, enforceQualityGate, exceedsBadRowThreshold } from "./quality-gate";
export { ScrubProcessor } from "./scrub";
export type {
  CellCleanerOptions,
  RecordSink,
  RunCounters,
  ScrubOptions,
  ScrubPath,
  ScrubResult,
} from "./types";
export { cleanColumnName, Uniquifier } from "./uniquifier";
