/**
 * Size-bounded rendering of newline-joined entry lists.
 *
 * Sheets rejects cells above 50 000 characters, so long histories and lesson
 * lists are windowed (head + tail around a count marker) or hard-truncated.
 */

export const TRUNCATED_MARKER = "\n[TRUNCATED]";

export interface TruncateOptions {
  maxChars: number;
  /** Windowing only applies above this many entries */
  windowThreshold: number;
  headCount: number;
  tailCount: number;
  skippedMarker: (skipped: number) => string;
}

/**
 * Cut text to at most `maxChars`, ending with the truncation marker
 */
export function hardTruncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  if (maxChars <= TRUNCATED_MARKER.length) {
    return TRUNCATED_MARKER.slice(0, Math.max(0, maxChars));
  }
  return text.slice(0, maxChars - TRUNCATED_MARKER.length) + TRUNCATED_MARKER;
}

/**
 * Join entries with newlines, keeping the result within `maxChars`
 */
export function joinWithinLimit(
  entries: readonly string[],
  options: TruncateOptions
): string {
  const joined = entries.join("\n");
  if (joined.length <= options.maxChars) {
    return joined;
  }

  if (entries.length > options.windowThreshold) {
    const skipped = entries.length - options.headCount - options.tailCount;
    const windowed = [
      ...entries.slice(0, options.headCount),
      options.skippedMarker(skipped),
      ...entries.slice(entries.length - options.tailCount),
    ].join("\n");
    return hardTruncate(windowed, options.maxChars);
  }

  return hardTruncate(joined, options.maxChars);
}
