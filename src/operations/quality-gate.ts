/**
 * End-of-run quality gate
 *
 * A run with more than 10% bad rows fails even though its output is
 * complete. This usually means the delimiter or quote setting is wrong.
 */

import { TooManyBadRowsError } from "../errors";
import type { RunCounters } from "./types";

/** Bad rows may make up at most 1/BAD_ROW_DIVISOR of all rows */
export const BAD_ROW_DIVISOR = 10;

/**
 * Whether `badRows` out of `totalRows` is over the threshold
 */
export function exceedsBadRowThreshold(badRows: number, totalRows: number): boolean {
  return badRows * BAD_ROW_DIVISOR > totalRows;
}

/**
 * @throws {TooManyBadRowsError} when the run is over the threshold
 */
export function enforceQualityGate({ rows, badRows }: RunCounters): void {
  if (exceedsBadRowThreshold(badRows, rows)) {
    throw new TooManyBadRowsError(badRows, rows);
  }
}
