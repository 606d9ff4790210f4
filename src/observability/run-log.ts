import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "./logger.ts";
import { NULL_LOGGER } from "./logger.ts";
import { errorMessage } from "../types/errors.ts";

// ── File Writer (DI for testability) ────────────────────────────────────────

export interface LogFileWriter {
  appendFile(path: string, content: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export const NODE_LOG_FILE_WRITER: LogFileWriter = {
  appendFile: async (path, content) => {
    await appendFile(path, content, "utf-8");
  },
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

// ── Run Log Entry ───────────────────────────────────────────────────────────

export interface RunLogEntry {
  readonly event: string;
  readonly timestamp: string;
  readonly [field: string]: unknown;
}

export interface JsonLinesLogOptions {
  readonly writer?: LogFileWriter;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

// ── JsonLinesLog ────────────────────────────────────────────────────────────

/**
 * Append-only JSON-lines file: one `{ event, timestamp, ...fields }` object
 * per line. The directory is created on first write.
 *
 * `append()` never rejects. A failed write is logged and dropped; callers
 * may await it or fire and forget. Writes are chained so lines land in call
 * order.
 */
export class JsonLinesLog {
  private readonly writer: LogFileWriter;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private tail: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    readonly filePath: string,
    options: JsonLinesLogOptions = {},
  ) {
    this.writer = options.writer ?? NODE_LOG_FILE_WRITER;
    this.logger = options.logger ?? NULL_LOGGER;
    this.now = options.now ?? (() => new Date());
  }

  append(event: string, fields: Record<string, unknown> = {}): Promise<void> {
    const entry: RunLogEntry = {
      ...fields,
      event,
      timestamp: this.now().toISOString(),
    };

    let line: string;
    try {
      line = `${JSON.stringify(entry)}\n`;
    } catch (err: unknown) {
      this.logger.warn("run_log_entry_not_serializable", {
        event,
        error: errorMessage(err),
      });
      return this.tail;
    }

    this.tail = this.tail.then(() => this.write(line, event));
    return this.tail;
  }

  /** Resolves once every queued line has been written (or dropped). */
  flush(): Promise<void> {
    return this.tail;
  }

  private async write(line: string, event: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await this.writer.mkdir(dirname(this.filePath));
        this.directoryReady = true;
      }
      await this.writer.appendFile(this.filePath, line);
    } catch (err: unknown) {
      this.logger.warn("run_log_write_failed", {
        path: this.filePath,
        event,
        error: errorMessage(err),
      });
    }
  }
}
