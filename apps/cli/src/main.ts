#!/usr/bin/env node
import { loadConfig, type Env } from "../../../packages/core/config";
import { XclipGateway, XCLIP } from "../../../packages/core/clipboard/gateway";
import { XdotoolPaster, XDOTOOL } from "../../../packages/core/clipboard/paste";
import { JsonFileHistoryBackend } from "../../../packages/core/history/fileBackend";
import { HistoryStore } from "../../../packages/core/history/store";
import * as log from "../../../packages/core/logger";
import { isToolAvailable, runCommand, type CommandRunner } from "../../../packages/core/system/run";
import { parseArgs, usage, UsageError, type CliOptions } from "./args";
import { runDaemon } from "./daemon";
import { runPicker } from "./gui";
import { formatHistoryList } from "./list";

export type MainDeps = {
  env?: Env;
  run?: CommandRunner;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
};

/** Runs the command line and resolves to the process exit code. */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const run = deps.run ?? runCommand;

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    stderr.write(`${err.message}\n\n${usage()}\n`);
    return 2;
  }
  const { mode, maxItems } = options;
  if (mode === "help") {
    stdout.write(`${usage()}\n`);
    return 0;
  }

  const config = loadConfig(deps.env ?? process.env, { maxItems });
  log.setLogLevel(config.logLevel);

  if (!(await isToolAvailable(XCLIP, ["-version"], run, config.toolTimeoutMs))) {
    stderr.write("Error: xclip is not installed or not in PATH\n");
    stderr.write("Please install it with: sudo apt install xclip\n");
    return 1;
  }

  const store = HistoryStore.load(new JsonFileHistoryBackend(config.historyFile), {
    capacity: config.maxItems,
  });
  const gateway = new XclipGateway({ timeoutMs: config.toolTimeoutMs, run });

  switch (mode) {
    case "list":
      stdout.write(`${formatHistoryList(store.entries).join("\n")}\n`);
      return 0;
    case "daemon": {
      const controller = new AbortController();
      const stop = () => controller.abort();
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
      try {
        await runDaemon({ store, gateway, config }, controller.signal);
      } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
      }
      return 0;
    }
    case "gui": {
      if (!process.stdin.isTTY) {
        stderr.write("Error: --gui needs an interactive terminal\n");
        return 1;
      }
      if (!(await isToolAvailable(XDOTOOL, ["version"], run, config.toolTimeoutMs))) {
        log.warn("xdotool not found; the selected entry will be copied but not pasted");
      }
      const paster = new XdotoolPaster({ keys: config.pasteKeys, timeoutMs: config.toolTimeoutMs, run });
      await runPicker({ store, gateway, paster, config });
      return 0;
    }
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error("cliptrail failed:", log.describeError(err));
      process.exitCode = 1;
    }
  );
}
