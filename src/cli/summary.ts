/**
 * End-of-run summary line
 */

import type { RunCounters } from "../operations/types";

const BINARY_UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB"] as const;

/**
 * Format a byte count in binary units: `512 B`, `1.5 KiB`, `12.34 MiB`
 */
export function formatBytes(bytes: number): string {
  let value = Math.max(0, bytes);
  let unit = 0;
  while (value >= 1024 && unit < BINARY_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  if (unit === 0) {
    return `${Math.round(value)} B`;
  }
  const digits = value.toFixed(2).replace(/\.?0+$/, "");
  return `${digits} ${BINARY_UNITS[unit]}`;
}

/**
 * `<rows> rows (<bad> bad) in <secs> seconds, <rate>/sec`
 *
 * The rate is input bytes per second; a run too short to time reports 0.
 */
export function formatSummary(counters: RunCounters, seconds: number, bytesRead: number): string {
  const rate = seconds > 0 ? bytesRead / seconds : 0;
  return `${counters.rows} rows (${counters.badRows} bad) in ${seconds.toFixed(2)} seconds, ${formatBytes(rate)}/sec`;
}
