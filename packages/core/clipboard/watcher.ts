import * as log from "../logger";

export type ClipboardReader = () => Promise<string>;
export type ChangeHandler = (text: string) => void;

export interface ClipboardWatcher {
  start(): void;
  stop(): void;
  onChange(cb: ChangeHandler): void;
}

export type WatcherOptions = {
  intervalMs?: number;
  /** Delay before the next cycle after a failed one */
  backoffMs?: number;
  /** Clipboard value already known at startup; not reported */
  initialText?: string;
};

/**
 * Polls the clipboard, one read per cycle, and reports each new non-empty
 * value. Cycles are chained so a slow read never overlaps the next one.
 */
export function createWatcher(read: ClipboardReader, options: WatcherOptions = {}): ClipboardWatcher {
  const intervalMs = options.intervalMs ?? 1000;
  const backoffMs = options.backoffMs ?? 5000;
  const handlers: ChangeHandler[] = [];
  let lastText = options.initialText ?? "";
  let timer: ReturnType<typeof setTimeout> | undefined;
  let running = false;

  function schedule(delayMs: number) {
    timer = setTimeout(() => {
      timer = undefined;
      void check();
    }, delayMs);
  }

  async function check() {
    let delayMs = intervalMs;
    try {
      const text = await read();
      // An empty read means the clipboard could not be read; keep the last value
      // A read still in flight when stop() ran reports nothing
      if (running && text && text !== lastText) {
        lastText = text;
        log.debug("Clipboard changed");
        handlers.forEach((h) => h(text));
      }
    } catch (err) {
      log.error("Error monitoring clipboard:", log.describeError(err));
      delayMs = backoffMs;
    }
    if (running && !timer) schedule(delayMs);
  }

  return {
    start() {
      if (running) return;
      running = true;
      schedule(0);
      log.debug("Clipboard watcher started");
    },
    stop() {
      if (!running) return;
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      log.debug("Clipboard watcher stopped");
    },
    onChange(cb: ChangeHandler) {
      handlers.push(cb);
    },
  };
}
