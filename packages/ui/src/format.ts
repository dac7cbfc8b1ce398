import type { HistoryEntry } from "../../core/models/HistoryEntry";
import { toDisplayLine } from "../../core/history/preview";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function parse(timestamp: string): Date | null {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** `HH:MM:SS` in local time; unparsable timestamps are shown as stored. */
export function formatClock(timestamp: string): string {
  const date = parse(timestamp);
  if (!date) return timestamp;
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `YYYY-MM-DD HH:MM:SS` in local time; unparsable timestamps are shown as stored. */
export function formatDateTime(timestamp: string): string {
  const date = parse(timestamp);
  if (!date) return timestamp;
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${day} ${formatClock(timestamp)}`;
}

export function formatRow(entry: HistoryEntry): string {
  return `[${formatClock(entry.timestamp)}] ${toDisplayLine(entry.preview)}`;
}
