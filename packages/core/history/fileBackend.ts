import fs from "node:fs";
import path from "node:path";
import { HistoryEntry } from "../models/HistoryEntry";
import { HistoryStorageBackend } from "./types";

/**
 * Keeps the history in a single JSON file. Writes land in a temp file that is
 * renamed over the target, so readers only ever see a complete file.
 */
export class JsonFileHistoryBackend implements HistoryStorageBackend {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  read(): unknown {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return undefined;
      throw err;
    }
    return JSON.parse(raw);
  }

  write(entries: readonly HistoryEntry[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    try {
      fs.writeFileSync(tmpPath, JSON.stringify(entries, null, 2), "utf8");
      fs.renameSync(tmpPath, this.filePath);
    } finally {
      fs.rmSync(tmpPath, { force: true });
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
