import React from "react";
import { render } from "ink-testing-library";
import { HistoryPicker } from "../../packages/ui/src/HistoryPicker";
import type { HistoryEntry } from "../../packages/core/models/HistoryEntry";

const ARROW_DOWN = "\u001B[B";
const ENTER = "\r";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function entry(content: string, second: number): HistoryEntry {
  return { content, preview: content, timestamp: new Date(2024, 0, 2, 3, 4, second).toISOString() };
}

const entries = [entry("hello", 5), entry("multi\nline", 6)];

function setup(overrides: Partial<React.ComponentProps<typeof HistoryPicker>> = {}) {
  const onSelect = jest.fn();
  const onClear = jest.fn();
  const onRefresh = jest.fn((): readonly HistoryEntry[] => []);
  const view = render(
    <HistoryPicker entries={entries} onSelect={onSelect} onClear={onClear} onRefresh={onRefresh} {...overrides} />
  );
  return { ...view, onSelect, onClear, onRefresh };
}

async function press(view: { stdin: { write(data: string): void } }, input: string) {
  view.stdin.write(input);
  await delay(50);
}

describe("HistoryPicker", () => {
  test("lists entries with the first one selected", () => {
    const { lastFrame, unmount } = setup();
    const frame = lastFrame() ?? "";
    expect(frame).toContain("Clipboard History");
    expect(frame).toContain("› [03:04:05] hello");
    expect(frame).toContain("[03:04:06] multi line");
    expect(frame).not.toContain("› [03:04:06]");
    unmount();
  });

  test("shows a placeholder when empty", () => {
    const { lastFrame, unmount } = setup({ entries: [] });
    expect(lastFrame()).toContain("No clipboard history.");
    unmount();
  });

  test("moves the selection and picks an entry", async () => {
    const view = setup();
    await delay(50);
    await press(view, ARROW_DOWN);
    expect(view.lastFrame()).toContain("› [03:04:06] multi line");
    await press(view, ENTER);
    expect(view.onSelect).toHaveBeenCalledWith(entries[1]);
    view.unmount();
  });

  test("closes on q without picking", async () => {
    const view = setup();
    await delay(50);
    await press(view, "q");
    expect(view.onSelect).not.toHaveBeenCalled();
    view.unmount();
  });

  test("asks before clearing", async () => {
    const view = setup();
    await delay(50);
    await press(view, "c");
    expect(view.lastFrame()).toContain("Clear all clipboard history? (y/n)");
    await press(view, "n");
    expect(view.onClear).not.toHaveBeenCalled();
    expect(view.lastFrame()).not.toContain("Clear all clipboard history?");

    await press(view, "c");
    await press(view, "y");
    expect(view.onClear).toHaveBeenCalledTimes(1);
    expect(view.lastFrame()).toContain("No clipboard history.");
    view.unmount();
  });

  test("shows refreshed entries", async () => {
    const onRefresh = jest.fn((): readonly HistoryEntry[] => [entry("fresh", 9)]);
    const view = setup({ onRefresh });
    await delay(50);
    await press(view, "r");
    expect(onRefresh).toHaveBeenCalledTimes(1);
    expect(view.lastFrame()).toContain("› [03:04:09] fresh");
    expect(view.lastFrame()).not.toContain("hello");
    view.unmount();
  });

  test("windows long lists", () => {
    const many = Array.from({ length: 20 }, (_, i) => entry(`item ${i}`, i));
    const { lastFrame, unmount } = setup({ entries: many, windowSize: 5 });
    const frame = lastFrame() ?? "";
    expect(frame).toContain("item 4");
    expect(frame).not.toContain("item 5");
    expect(frame).toContain("↓ 15 more");
    unmount();
  });
});
