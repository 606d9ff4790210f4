import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { randomUUID } from "node:crypto";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { JsonLinesLog } from "../observability/run-log.ts";
import type { LogFileWriter } from "../observability/run-log.ts";
import { errorMessage } from "../types/errors.ts";
import type { PlanContract, ProposedTask } from "./types.ts";

// ── File Writer ─────────────────────────────────────────────────────────────

export interface CrewFileWriter extends LogFileWriter {
  writeFile(path: string, content: string | Uint8Array): Promise<void>;
}

export const NODE_CREW_FILE_WRITER: CrewFileWriter = {
  appendFile: async (path, content) => {
    await appendFile(path, content, "utf-8");
  },
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  writeFile: async (path, content) => {
    await writeFile(path, content);
  },
};

// ── Run Events ──────────────────────────────────────────────────────────────

export interface TaskOutcome {
  readonly toolCalls: number;
  readonly tokens: number;
}

export interface CrewTaskRecord {
  readonly task: ProposedTask;
  readonly messages: readonly string[];
  readonly outcome: TaskOutcome;
}

export interface CrewStoreOptions {
  readonly runId?: string;
  readonly writer?: CrewFileWriter;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

// ── Crew Store ──────────────────────────────────────────────────────────────

/**
 * On-disk record of one crew run:
 *
 *   <baseDir>/crew-runs/<runId>/contract.json
 *   <baseDir>/crew-runs/<runId>/events.jsonl
 *   <baseDir>/crew-runs/<runId>/artifacts/<name>
 *
 * Contract and event writes are best effort. Artifact writes reject, since
 * the agent needs the path it gets back.
 */
export class CrewStore {
  readonly runId: string;
  readonly rootDir: string;
  readonly artifactsDir: string;

  private readonly writer: CrewFileWriter;
  private readonly logger: Logger;
  private readonly log: JsonLinesLog;

  constructor(baseDir: string, options: CrewStoreOptions = {}) {
    this.runId = options.runId ?? randomUUID();
    this.rootDir = join(baseDir, "crew-runs", this.runId);
    this.artifactsDir = join(this.rootDir, "artifacts");
    this.writer = options.writer ?? NODE_CREW_FILE_WRITER;
    this.logger = (options.logger ?? NULL_LOGGER).child({ module: "crew-store", runId: this.runId });
    this.log = new JsonLinesLog(join(this.rootDir, "events.jsonl"), {
      writer: this.writer,
      logger: this.logger,
      now: options.clock,
    });
  }

  get eventsPath(): string {
    return this.log.filePath;
  }

  async persistContract(contract: PlanContract): Promise<void> {
    try {
      await this.writer.mkdir(this.rootDir);
      await this.writer.writeFile(
        join(this.rootDir, "contract.json"),
        `${JSON.stringify(contract, null, 2)}\n`,
      );
    } catch (err: unknown) {
      this.logger.warn("crew_contract_persist_failed", { error: errorMessage(err) });
    }
  }

  appendTask(record: CrewTaskRecord): Promise<void> {
    return this.log.append("task", {
      task: record.task,
      messages: record.messages,
      outcome: record.outcome,
    });
  }

  append(event: string, fields: Record<string, unknown> = {}): Promise<void> {
    return this.log.append(event, fields);
  }

  /** Write an artifact body and return its path. */
  async registerArtifact(name: string, body: string | Uint8Array): Promise<string> {
    await this.writer.mkdir(this.artifactsDir);
    const destination = join(this.artifactsDir, basename(name));
    await this.writer.writeFile(destination, body);
    return destination;
  }

  flush(): Promise<void> {
    return this.log.flush();
  }
}
