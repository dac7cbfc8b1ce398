import type { HistoryEntry } from "../../../packages/core/models/HistoryEntry";
import { toDisplayLine } from "../../../packages/core/history/preview";
import { formatDateTime } from "../../../packages/ui/src/format";

export function formatHistoryList(entries: readonly HistoryEntry[]): string[] {
  if (entries.length === 0) return ["No clipboard history found."];
  const lines = [`Clipboard History (${entries.length} items):`, "-".repeat(50)];
  entries.forEach((entry, i) => {
    lines.push(`${i + 1}. [${formatDateTime(entry.timestamp)}] ${toDisplayLine(entry.preview)}`);
    lines.push("");
  });
  return lines;
}
