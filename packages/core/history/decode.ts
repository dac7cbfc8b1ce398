/**
 * Turns whatever was read from storage into history entries.
 *
 * Files written by older versions may lack `preview` or `timestamp`; those are
 * filled in here and nowhere else.
 */
import { HistoryEntry, MAX_CONTENT_LENGTH, contentLength } from "../models/HistoryEntry";
import { makePreview } from "./preview";

/**
 * Returns null when `raw` is not a list at all. Unusable elements are skipped.
 */
export function decodeHistory(raw: unknown, now: () => number = Date.now): HistoryEntry[] | null {
  if (!Array.isArray(raw)) return null;
  const entries: HistoryEntry[] = [];
  let loadedAt: string | undefined;
  for (const item of raw) {
    if (typeof item !== "object" || item === null) continue;
    const record = item as Record<string, unknown>;
    const content = record.content;
    if (typeof content !== "string" || !content || contentLength(content) > MAX_CONTENT_LENGTH) continue;
    let timestamp: string;
    if (typeof record.timestamp === "string" && record.timestamp) {
      timestamp = record.timestamp;
    } else {
      loadedAt ??= new Date(now()).toISOString();
      timestamp = loadedAt;
    }
    const preview = typeof record.preview === "string" ? record.preview : makePreview(content);
    entries.push({ content, timestamp, preview });
  }
  return entries;
}
