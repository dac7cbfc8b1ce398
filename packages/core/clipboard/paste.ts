import { CommandRunner, describeFailure, runCommand } from "../system/run";
import * as log from "../logger";

/**
 * Puts keyboard focus back where the user was and pastes there.
 */
export interface PasteSimulator {
  /** Id of the focused window, or null when unknown */
  activeWindow(): Promise<string | null>;
  /** Focus `windowId` (when given) and send the paste keystroke */
  paste(windowId: string | null): Promise<boolean>;
}

export type XdotoolPasterOptions = {
  /** xdotool key sequence */
  keys?: string;
  timeoutMs?: number;
  run?: CommandRunner;
};

export const XDOTOOL = "xdotool";

export class XdotoolPaster implements PasteSimulator {
  private readonly keys: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: XdotoolPasterOptions = {}) {
    this.keys = options.keys ?? "ctrl+shift+v";
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.run = options.run ?? runCommand;
  }

  async activeWindow(): Promise<string | null> {
    const result = await this.run(XDOTOOL, ["getactivewindow"], { timeoutMs: this.timeoutMs });
    const id = result.stdout.trim();
    if (result.code !== 0 || !id) {
      log.warn("Could not get the active window:", describeFailure(result));
      return null;
    }
    return id;
  }

  async paste(windowId: string | null): Promise<boolean> {
    if (windowId) {
      const focus = await this.run(XDOTOOL, ["windowactivate", "--sync", windowId], {
        timeoutMs: this.timeoutMs,
      });
      if (focus.code !== 0) {
        log.warn(`Failed to focus window ${windowId}:`, describeFailure(focus));
        return false;
      }
    }
    const key = await this.run(XDOTOOL, ["key", this.keys], { timeoutMs: this.timeoutMs });
    if (key.code !== 0) {
      log.warn("Failed to paste:", describeFailure(key));
      return false;
    }
    return true;
  }
}
