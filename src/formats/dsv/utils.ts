/**
 * DSV Utility Functions Module
 */

import { ConfigError } from "../../errors";
import { CHAR_ALIASES } from "./constants";

const encoder = new TextEncoder();

/**
 * Parse a character specifier into a single byte.
 *
 * Accepts any one-byte string, the two-character `\t` (easier to type in a
 * shell than a literal tab), `tab`, and `none`, which returns `null`.
 *
 * @throws {ConfigError} for anything else, including multi-byte characters
 */
export function parseCharSpecifier(specifier: string): number | null {
  const bytes = encoder.encode(specifier);
  if (bytes.length === 1) {
    return bytes[0] ?? null;
  }

  const alias = CHAR_ALIASES.get(specifier);
  if (alias !== undefined) {
    return alias;
  }

  throw new ConfigError(`cannot parse character specifier '${specifier}'`);
}

/**
 * Whether `bytes` contains `byte`
 */
export function containsByte(bytes: Uint8Array, byte: number): boolean {
  return bytes.indexOf(byte) !== -1;
}
