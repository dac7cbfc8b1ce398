import { HistoryEntry, MAX_CONTENT_LENGTH, contentLength } from "../models/HistoryEntry";
import { decodeHistory } from "./decode";
import { makePreview } from "./preview";
import { HistoryStorageBackend } from "./types";
import * as log from "../logger";

export const DEFAULT_CAPACITY = 50;

export type HistoryStoreOptions = {
  /** Maximum retained entries */
  capacity?: number;
  now?: () => number;
};

/**
 * Bounded most-recent-first clipboard history mirrored to a storage backend.
 *
 * Each distinct content appears once; inserting a known content moves it to
 * the front. Memory is authoritative for the lifetime of the process: failed
 * writes are logged and the store keeps going.
 */
export class HistoryStore {
  readonly capacity: number;
  private items: HistoryEntry[] = [];
  private lastSeenContent = "";
  private readonly backend: HistoryStorageBackend;
  private readonly now: () => number;

  private constructor(backend: HistoryStorageBackend, options: HistoryStoreOptions) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.backend = backend;
    this.now = options.now ?? Date.now;
  }

  /**
   * Build a store from whatever the backend holds. Missing or damaged data
   * yields an empty store; storage problems are logged, never thrown.
   *
   * @throws RangeError when `capacity` is not a positive integer. Callers
   * validate user input before getting here, as the CLI does for `--max-items`.
   */
  static load(backend: HistoryStorageBackend, options: HistoryStoreOptions = {}): HistoryStore {
    const store = new HistoryStore(backend, options);
    store.reload();
    return store;
  }

  get entries(): readonly HistoryEntry[] {
    return this.items;
  }

  get lastSeen(): string {
    return this.lastSeenContent;
  }

  /**
   * Replace the entries with the backend's current contents. When the backend
   * cannot be read the entries in memory are kept. `lastSeen` is kept either way.
   */
  reload(): void {
    const loaded = this.readBackend();
    if (loaded) this.items = loaded;
  }

  /** Stored entries, [] when nothing is stored yet, null when unreadable. */
  private readBackend(): HistoryEntry[] | null {
    let raw: unknown;
    try {
      raw = this.backend.read();
    } catch (err) {
      log.warn(`Could not read history from ${this.backend.location}:`, log.describeError(err));
      return null;
    }
    if (raw === undefined) {
      log.warn(`No history found at ${this.backend.location}`);
      return [];
    }
    const decoded = decodeHistory(raw, this.now);
    if (!decoded) {
      log.warn(`History at ${this.backend.location} is not a list, ignoring it`);
      return null;
    }
    const seen = new Set<string>();
    return decoded
      .filter((entry) => {
        if (seen.has(entry.content)) return false;
        seen.add(entry.content);
        return true;
      })
      .slice(0, this.capacity);
  }

  /**
   * Record a clipboard value. Returns false when it was ignored: empty,
   * unchanged since the last capture, or too large.
   */
  insert(content: string): boolean {
    if (!content || content === this.lastSeenContent) return false;
    const length = contentLength(content);
    if (length > MAX_CONTENT_LENGTH) {
      log.info(`Skipping clipboard content of ${length} characters (limit ${MAX_CONTENT_LENGTH})`);
      return false;
    }
    const entry: HistoryEntry = {
      content,
      timestamp: new Date(this.now()).toISOString(),
      preview: makePreview(content),
    };
    this.items = [entry, ...this.items.filter((item) => item.content !== content)].slice(0, this.capacity);
    this.save();
    this.lastSeenContent = content;
    return true;
  }

  /** Treat `content` as already captured without recording it. */
  markSeen(content: string): void {
    this.lastSeenContent = content;
  }

  clear(): void {
    this.items = [];
    this.save();
  }

  save(): void {
    try {
      this.backend.write(this.items);
    } catch (err) {
      log.error(`Failed to save history to ${this.backend.location}:`, log.describeError(err));
    }
  }
}
