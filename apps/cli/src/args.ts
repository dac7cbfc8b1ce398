import { coercePositiveInt, DEFAULT_MAX_ITEMS } from "../../../packages/core/config";

export type Mode = "daemon" | "gui" | "list" | "help";

export type CliOptions = {
  mode: Mode;
  maxItems: number;
};

/** Bad command line; the caller prints usage and exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const MODE_FLAGS: Record<string, Exclude<Mode, "help">> = {
  "--daemon": "daemon",
  "--gui": "gui",
  "--list": "list",
};

export function parseArgs(argv: string[]): CliOptions {
  const modes: Mode[] = [];
  let help = false;
  let maxItems = DEFAULT_MAX_ITEMS;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (Object.hasOwn(MODE_FLAGS, arg)) {
      modes.push(MODE_FLAGS[arg]);
    } else if (arg === "--max-items" || arg.startsWith("--max-items=")) {
      let value: string | undefined;
      if (arg === "--max-items") {
        value = argv[i + 1];
        i++;
      } else {
        value = arg.slice("--max-items=".length);
      }
      maxItems = parseMaxItems(value);
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (help) return { mode: "help", maxItems };
  if (modes.length > 1) {
    throw new UsageError(`Choose one of --daemon, --gui or --list (got ${modes.length})`);
  }
  return { mode: modes[0] ?? "help", maxItems };
}

function parseMaxItems(value: string | undefined): number {
  if (value === undefined) throw new UsageError("--max-items needs a value");
  const parsed = coercePositiveInt(value, 0);
  if (parsed === 0) throw new UsageError(`--max-items must be a positive integer, got "${value}"`);
  return parsed;
}

export function usage(): string {
  return [
    "Usage: cliptrail [--daemon | --gui | --list] [--max-items <n>]",
    "",
    "Clipboard history manager",
    "",
    "Options:",
    "  --daemon           Record clipboard changes until interrupted",
    "  --gui              Pick an entry from the history and paste it",
    "  --list             Print the history",
    `  --max-items <n>    Maximum number of items to keep (default: ${DEFAULT_MAX_ITEMS})`,
    "  -h, --help         Show this help",
  ].join("\n");
}
