import { XdotoolPaster } from "../../../packages/core/clipboard/paste";
import type { RunOptions, RunResult } from "../../../packages/core/system/run";

const ok: RunResult = { code: 0, stdout: "", stderr: "" };
const failed: RunResult = { code: 1, stdout: "", stderr: "XGetWindowProperty failed" };

describe("XdotoolPaster", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    warn.mockRestore();
  });

  test("returns the focused window id", async () => {
    const run = jest.fn<Promise<RunResult>, [string, string[], RunOptions]>(async () => ({ ...ok, stdout: "41943047\n" }));
    await expect(new XdotoolPaster({ run }).activeWindow()).resolves.toBe("41943047");
    expect(run).toHaveBeenCalledWith("xdotool", ["getactivewindow"], { timeoutMs: 5000 });
  });

  test("returns null when the window cannot be found", async () => {
    const run = jest.fn<Promise<RunResult>, [string, string[], RunOptions]>(async () => failed);
    await expect(new XdotoolPaster({ run }).activeWindow()).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith("Could not get the active window:", "exit code 1: XGetWindowProperty failed");
  });

  test("focuses the window then sends the paste keys", async () => {
    const run = jest.fn<Promise<RunResult>, [string, string[], RunOptions]>(async () => ok);
    const paster = new XdotoolPaster({ run, keys: "shift+Insert", timeoutMs: 1000 });
    await expect(paster.paste("42")).resolves.toBe(true);
    expect(run.mock.calls).toEqual([
      ["xdotool", ["windowactivate", "--sync", "42"], { timeoutMs: 1000 }],
      ["xdotool", ["key", "shift+Insert"], { timeoutMs: 1000 }],
    ]);
  });

  test("sends only the keys without a window", async () => {
    const run = jest.fn<Promise<RunResult>, [string, string[], RunOptions]>(async () => ok);
    await expect(new XdotoolPaster({ run }).paste(null)).resolves.toBe(true);
    expect(run.mock.calls).toEqual([["xdotool", ["key", "ctrl+shift+v"], { timeoutMs: 5000 }]]);
  });

  test("does not paste when focusing fails", async () => {
    const run = jest.fn<Promise<RunResult>, [string, string[], RunOptions]>(async () => failed);
    await expect(new XdotoolPaster({ run }).paste("42")).resolves.toBe(false);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
