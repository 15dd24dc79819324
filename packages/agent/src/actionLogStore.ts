import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ActionLogError, parseLogEntry, type ActionLogStore, type LogEntry } from "./actionLog.js";
import { stableJsonStringify } from "./hash.js";
import { silentLogger, type Logger } from "./logger.js";

export class MemoryActionLogStore implements ActionLogStore {
  private readonly lines: string[] = [];

  async append(entry: LogEntry): Promise<void> {
    this.lines.push(stableJsonStringify(entry, 0));
  }

  async load(): Promise<LogEntry[]> {
    return this.lines.map((line) => parseLogEntry(JSON.parse(line)));
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSON Lines file, one entry per line. A process killed mid-write can leave
 * a partial final line; loading drops it and keeps everything before it.
 */
export class FileActionLogStore implements ActionLogStore {
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    logger: Logger = silentLogger(),
  ) {
    this.logger = logger.child("log-store");
  }

  async append(entry: LogEntry): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${stableJsonStringify(entry, 0)}\n`, "utf8");
  }

  async load(): Promise<LogEntry[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const lines = text.split("\n");
    const entries: LogEntry[] = [];
    for (const [index, line] of lines.entries()) {
      if (line.trim().length === 0) continue;
      const isLast = lines.slice(index + 1).every((rest) => rest.trim().length === 0);
      try {
        entries.push(parseLogEntry(JSON.parse(line)));
      } catch (error) {
        if (isLast && !text.endsWith("\n")) {
          this.logger.warn("dropped torn final line", { path: this.path, line: index + 1 });
          break;
        }
        const detail = error instanceof Error ? error.message : String(error);
        throw new ActionLogError("LOG_CORRUPT", `${this.path}:${index + 1}: ${detail}`);
      }
    }
    return entries;
  }
}
