import type { AppConfig } from "../../../packages/core/config";
import type { ClipboardGateway } from "../../../packages/core/clipboard/gateway";
import { createWatcher } from "../../../packages/core/clipboard/watcher";
import { toDisplayLine } from "../../../packages/core/history/preview";
import type { HistoryStore } from "../../../packages/core/history/store";
import * as log from "../../../packages/core/logger";

export type DaemonDeps = {
  store: HistoryStore;
  gateway: ClipboardGateway;
  config: Pick<AppConfig, "pollIntervalMs" | "backoffMs">;
};

/**
 * Record clipboard changes into the store until `signal` aborts. Whatever is
 * on the clipboard at startup is treated as already seen.
 */
export async function runDaemon({ store, gateway, config }: DaemonDeps, signal: AbortSignal): Promise<void> {
  const initial = await gateway.readClipboard();
  store.markSeen(initial);

  const watcher = createWatcher(() => gateway.readClipboard(), {
    intervalMs: config.pollIntervalMs,
    backoffMs: config.backoffMs,
    initialText: initial,
  });
  watcher.onChange((text) => {
    // another process may have cleared the history since the last change
    store.reload();
    if (store.insert(text)) {
      log.info(`Added to history: ${toDisplayLine(text.slice(0, 50))}...`);
    }
  });

  log.info("Clipboard monitoring started. Press Ctrl+C to stop.");
  watcher.start();
  await new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
  watcher.stop();
  log.info("Clipboard monitoring stopped.");
}
