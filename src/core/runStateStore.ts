import path from "node:path";
import { schedulerLogger } from "../logger.js";
import { atomicWriteText, readTextIfExists } from "../utils/fs.js";

export const RUN_STATE_FILE = "last_success_iso.txt";

export interface RunStateStore {
  readLastSuccess(): Date | null;
  writeLastSuccess(at: Date): void;
}

/** Plain-text ISO-8601 timestamp; absent or unreadable means never succeeded. */
export class FileRunStateStore implements RunStateStore {
  readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, RUN_STATE_FILE);
  }

  readLastSuccess(): Date | null {
    const raw = (readTextIfExists(this.filePath) ?? "").trim();
    if (!raw) return null;
    const at = new Date(raw);
    if (Number.isNaN(at.getTime())) {
      schedulerLogger.warn({ filePath: this.filePath, raw: raw.slice(0, 80) }, "Run state unreadable, treat as never succeeded");
      return null;
    }
    return at;
  }

  writeLastSuccess(at: Date): void {
    atomicWriteText(this.filePath, `${at.toISOString()}\n`);
  }
}
