/**
 * normalize.ts
 *
 * Canonical forms for names and titles before they are compared.
 */

/**
 * Lower-case, drop everything that is neither a letter, a digit nor
 * whitespace, collapse whitespace and trim.
 *
 * @example
 * normalize("  Guns N' Roses!") // "guns n roses"
 */
export function normalize(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Strip parenthesised and bracketed annotations from a song title.
 * Setlists often carry them ("Song (Acoustic)", "Song [snippet]") while the
 * catalog does not.
 */
export function cleanSongTitle(title: string): string {
  return title
    .replace(/\([^)]*\)/g, " ")
    .replace(/\[[^\]]*\]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}
