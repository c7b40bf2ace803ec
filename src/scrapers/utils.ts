/**
 * Maps a case name to a token safe to use as a file name on any platform.
 * Runs of anything other than letters, digits, underscores and hyphens become
 * a single underscore; leading and trailing underscores are dropped.
 * Applying it twice gives the same result as applying it once.
 * @param name The case name as listed on the archive page
 * @returns The sanitized name, without extension
 * @example
 * sanitizeFilename('State v. Smith (2020)')
 * // returns "State_v_Smith_2020"
 */
export function sanitizeFilename(name: string): string {
  return name
    .trim()
    .replace(/[^\p{L}\p{M}\p{N}_-]+/gu, "_")
    .replace(/__+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Returns the first match of a pattern in a block of text, or null.
 * When the pattern has a capture group the first group is returned,
 * otherwise the whole match.
 * @param text The text to search (markup, script, attribute value)
 * @param pattern The pattern to look for; flags other than 'g' are honoured
 */
export function extractFirstMatch(text: string, pattern: RegExp): string | null {
  const match = text.match(
    new RegExp(pattern.source, pattern.flags.replace("g", ""))
  );
  if (!match) return null;

  return match.length > 1 ? (match[1] ?? null) : match[0];
}
