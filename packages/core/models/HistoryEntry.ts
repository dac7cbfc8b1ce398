/**
 * A captured clipboard value as kept in the history.
 */
export interface HistoryEntry {
  /** Clipboard text, never empty */
  content: string;
  /** Capture time, ISO-8601 */
  timestamp: string;
  /** Short form of `content`, derived once when the entry is captured */
  preview: string;
}

/** Longest clipboard text accepted into the history (1 MiB of characters). */
export const MAX_CONTENT_LENGTH = 1024 * 1024;


const SURROGATE_PAIR = /[\uD800-\uDBFF][\uDC00-\uDFFF]/g;

/** Length of `text` in characters (code points), not UTF-16 units. */
export function contentLength(text: string): number {
  return text.length - (text.match(SURROGATE_PAIR)?.length ?? 0);
}
