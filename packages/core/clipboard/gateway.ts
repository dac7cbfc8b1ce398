import { CommandRunner, describeFailure, runCommand } from "../system/run";
import * as log from "../logger";

/**
 * Access to the system clipboard. Implementations report failure through the
 * return value and never throw.
 */
export interface ClipboardGateway {
  /** Current clipboard text, or "" when it cannot be read */
  readClipboard(): Promise<string>;
  writeClipboard(text: string): Promise<boolean>;
}

export type XclipGatewayOptions = {
  timeoutMs?: number;
  /** X selection to use */
  selection?: "clipboard" | "primary";
  run?: CommandRunner;
};

export const XCLIP = "xclip";

export class XclipGateway implements ClipboardGateway {
  private readonly timeoutMs: number;
  private readonly selection: string;
  private readonly run: CommandRunner;

  constructor(options: XclipGatewayOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.selection = options.selection ?? "clipboard";
    this.run = options.run ?? runCommand;
  }

  async readClipboard(): Promise<string> {
    const result = await this.run(XCLIP, ["-selection", this.selection, "-o"], {
      timeoutMs: this.timeoutMs,
    });
    if (result.code !== 0) {
      // xclip exits non-zero when the selection is empty, so keep this quiet
      log.debug("Clipboard read failed:", describeFailure(result));
      return "";
    }
    return result.stdout;
  }

  async writeClipboard(text: string): Promise<boolean> {
    const result = await this.run(XCLIP, ["-selection", this.selection], {
      input: text,
      timeoutMs: this.timeoutMs,
    });
    if (result.code !== 0) {
      log.warn("Clipboard write failed:", describeFailure(result));
      return false;
    }
    return true;
  }
}

/**
 * Clipboard held in a variable, for tests and headless runs.
 */
export class InMemoryClipboardGateway implements ClipboardGateway {
  constructor(public text = "") {}

  async readClipboard(): Promise<string> {
    return this.text;
  }

  async writeClipboard(text: string): Promise<boolean> {
    this.text = text;
    return true;
  }
}
