/**
 * Column-name cleaning and de-duplication
 */

const decoder = new TextDecoder("utf-8");
const IDENTIFIER_CHAR = /^[a-z0-9_]$/;

/**
 * Produces clean, unique column names from raw header fields.
 *
 * Names are lowercased and every character outside `[a-z0-9_]` becomes
 * `_`. A repeat of an already-produced name gets `_2`, `_3`, ... appended.
 *
 * Suffixed names are not tracked themselves, so a header `a,a,a_2` comes
 * out as `a,a_2,a_2`.
 *
 * @example
 * ```typescript
 * const uniquifier = new Uniquifier();
 * ["", "", "A", "a"].map((name) => uniquifier.uniqueIdFor(name));
 * // => ["_", "__2", "a", "a_2"]
 * ```
 */
export class Uniquifier {
  private readonly counts = new Map<string, number>();

  /**
   * Canonical name for the next header field. Call once per field, in order.
   */
  uniqueIdFor(rawName: string | Uint8Array): string {
    const cleaned = cleanColumnName(rawName);
    const seen = this.counts.get(cleaned) ?? 0;
    this.counts.set(cleaned, seen + 1);
    return seen === 0 ? cleaned : `${cleaned}_${seen + 1}`;
  }
}

/**
 * Lowercase and sanitize a name; never returns an empty string
 */
export function cleanColumnName(rawName: string | Uint8Array): string {
  const text = typeof rawName === "string" ? rawName : decoder.decode(rawName);
  let cleaned = "";
  for (const char of text.toLowerCase()) {
    cleaned += IDENTIFIER_CHAR.test(char) ? char : "_";
  }
  return cleaned === "" ? "_" : cleaned;
}
