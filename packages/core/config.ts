/**
 * Runtime configuration, read once at startup and handed to whoever needs it.
 */
import os from "node:os";
import path from "node:path";
import { isLogLevel, type LogLevel } from "./logger";

export const DEFAULT_MAX_ITEMS = 50;

export interface AppConfig {
  /** JSON file mirroring the history */
  historyFile: string;
  /** Maximum retained entries */
  maxItems: number;
  pollIntervalMs: number;
  /** Wait after a failed polling cycle */
  backoffMs: number;
  /** Upper bound for every external tool invocation */
  toolTimeoutMs: number;
  /** Wait between closing the picker and sending the paste keystroke */
  pasteDelayMs: number;
  /** xdotool key sequence used to paste */
  pasteKeys: string;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

export function defaultHistoryFile(): string {
  return path.join(os.homedir(), ".clipboard_history.json");
}

export function loadConfig(env: Env = process.env, overrides: Partial<AppConfig> = {}): AppConfig {
  const logLevel = env.CLIPTRAIL_LOG_LEVEL?.toLowerCase();
  return {
    historyFile: env.CLIPTRAIL_HISTORY_FILE || defaultHistoryFile(),
    maxItems: DEFAULT_MAX_ITEMS,
    pollIntervalMs: coercePositiveInt(env.CLIPTRAIL_POLL_INTERVAL_MS, 1000),
    backoffMs: coercePositiveInt(env.CLIPTRAIL_BACKOFF_MS, 5000),
    toolTimeoutMs: coercePositiveInt(env.CLIPTRAIL_TOOL_TIMEOUT_MS, 5000),
    pasteDelayMs: coercePositiveInt(env.CLIPTRAIL_PASTE_DELAY_MS, 500),
    pasteKeys: env.CLIPTRAIL_PASTE_KEYS?.trim() || "ctrl+shift+v",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    ...overrides,
  };
}

export function coercePositiveInt(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value, 10);
    if (parsed > 0) return parsed;
  }
  return fallback;
}
