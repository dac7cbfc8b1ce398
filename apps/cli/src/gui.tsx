import React from "react";
import { render } from "ink";
import { setTimeout as delay } from "node:timers/promises";
import type { AppConfig } from "../../../packages/core/config";
import type { ClipboardGateway } from "../../../packages/core/clipboard/gateway";
import type { PasteSimulator } from "../../../packages/core/clipboard/paste";
import type { HistoryStore } from "../../../packages/core/history/store";
import type { HistoryEntry } from "../../../packages/core/models/HistoryEntry";
import * as log from "../../../packages/core/logger";
import { HistoryPicker } from "../../../packages/ui/src/HistoryPicker";

export type PickerDeps = {
  store: HistoryStore;
  gateway: ClipboardGateway;
  paster: PasteSimulator;
  config: Pick<AppConfig, "pasteDelayMs">;
};

/**
 * Show the picker; the chosen entry goes to the clipboard and is pasted into
 * the window that was focused when the picker opened.
 */
export async function runPicker(deps: PickerDeps): Promise<void> {
  const { store } = deps;
  const previousWindow = await deps.paster.activeWindow();
  const selection: { entry?: HistoryEntry } = {};

  const app = render(
    <HistoryPicker
      entries={store.entries}
      onSelect={(entry) => {
        selection.entry = entry;
      }}
      onClear={() => store.clear()}
      onRefresh={() => {
        store.reload();
        return store.entries;
      }}
    />
  );
  await app.waitUntilExit();

  if (selection.entry) {
    await applySelection(deps, selection.entry, previousWindow);
  }
}

/**
 * Put `entry` on the clipboard, then paste it into `windowId` once the
 * picker's window is gone. Returns whether the paste went through.
 */
export async function applySelection(
  { store, gateway, paster, config }: PickerDeps,
  entry: HistoryEntry,
  windowId: string | null
): Promise<boolean> {
  if (!(await gateway.writeClipboard(entry.content))) {
    log.warn("Could not copy the selected entry to the clipboard");
    return false;
  }
  store.markSeen(entry.content);
  await delay(config.pasteDelayMs);
  return await paster.paste(windowId);
}
