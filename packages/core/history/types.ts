import { HistoryEntry } from "../models/HistoryEntry";

/**
 * Storage backend interface for clipboard history.
 *
 * Both calls are synchronous and whole-value: the backend never sees a partial
 * history.
 */
export interface HistoryStorageBackend {
  /** Where the history lives, for log lines */
  readonly location: string;
  /** Parsed stored data, or undefined when nothing has been stored yet. Throws when unreadable. */
  read(): unknown;
  write(entries: readonly HistoryEntry[]): void;
}

/**
 * In-memory backend holding the serialized form, so reads go through the same
 * parsing as a file would.
 */
export class InMemoryHistoryBackend implements HistoryStorageBackend {
  readonly location = "memory";
  /** Serialized history; set it directly to simulate a damaged store */
  raw: string | undefined;

  constructor(initial?: string) {
    this.raw = initial;
  }

  read(): unknown {
    if (this.raw === undefined) return undefined;
    return JSON.parse(this.raw);
  }

  write(entries: readonly HistoryEntry[]): void {
    this.raw = JSON.stringify(entries);
  }
}
