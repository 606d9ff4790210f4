import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join } from "node:path";
import type { EventBus } from "../events/event-bus.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { AppError, errorMessage } from "../types/errors.ts";
import type { AutomationEvent } from "./types.ts";

// ── Metrics ─────────────────────────────────────────────────────────────────

export interface GuardMetrics {
  /** Share of null cells in the sampled rows, 0..1. */
  readonly nullPercentage: number;
  /** Share of sampled rows that repeat an earlier row, 0..1. */
  readonly duplicateRatio: number;
  /** Header names of columns holding at most one distinct value. */
  readonly constantColumns: readonly string[];
}

export const GUARD_REPORT_NAME = "GuardReport.md";
export const DEFAULT_GUARD_SAMPLE_ROWS = 500;

const NULL_TOKENS: ReadonlySet<string> = new Set(["", "na", "null"]);
const ROW_KEY_SEPARATOR = "|\u001F";

function splitCells(line: string): string[] {
  return line.split(",").map((cell) => cell.trim());
}

function parseRow(line: string, width: number): string[] {
  const cells = splitCells(line);
  if (cells.length >= width) return cells.slice(0, width);
  return [...cells, ...Array.from({ length: width - cells.length }, () => "")];
}

/**
 * Metrics over the first `sampleRows` data rows of a CSV text. The first
 * non-empty line is the header; blank lines are skipped.
 */
export function computeGuardMetrics(
  text: string,
  sampleRows: number = DEFAULT_GUARD_SAMPLE_ROWS,
): GuardMetrics {
  const lines = text.split(/\r\n|\r|\n/).filter((line) => line.length > 0);
  const headerLine = lines[0];
  if (headerLine === undefined) {
    return { nullPercentage: 0, duplicateRatio: 0, constantColumns: [] };
  }

  const header = splitCells(headerLine);
  const rows = lines.slice(1, 1 + Math.max(0, sampleRows)).map((line) => parseRow(line, header.length));

  let nulls = 0;
  let duplicates = 0;
  const seen = new Set<string>();
  const columnValues = header.map(() => new Set<string>());

  for (const row of rows) {
    const key = row.join(ROW_KEY_SEPARATOR);
    if (seen.has(key)) duplicates++;
    else seen.add(key);

    row.forEach((value, index) => {
      if (NULL_TOKENS.has(value.toLowerCase())) nulls++;
      columnValues[index]?.add(value);
    });
  }

  const totalCells = rows.length * header.length;
  return {
    nullPercentage: totalCells > 0 ? nulls / totalCells : 0,
    duplicateRatio: rows.length > 0 ? duplicates / rows.length : 0,
    constantColumns: header.filter((_, index) => (columnValues[index]?.size ?? 0) <= 1),
  };
}

// ── Report ──────────────────────────────────────────────────────────────────

const RATIO_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 2,
  useGrouping: false,
});

export function formatGuardReport(metrics: GuardMetrics): string {
  const constants =
    metrics.constantColumns.length > 0 ? metrics.constantColumns.join(", ") : "None";
  return [
    "# Data Guard Report",
    `- Null percentage: ${RATIO_FORMAT.format(metrics.nullPercentage)}`,
    `- Duplicate ratio: ${RATIO_FORMAT.format(metrics.duplicateRatio)}`,
    `- Constant columns: ${constants}`,
    "",
  ].join("\n");
}

// ── File System (DI for testability) ────────────────────────────────────────

export interface DataGuardFileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export const NODE_DATA_GUARD_FILE_SYSTEM: DataGuardFileSystem = {
  readFile: (path) => readFile(path, "utf-8"),
  writeFile: async (path, content) => {
    await writeFile(path, content, "utf-8");
  },
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

// ── Data Guard Engine ───────────────────────────────────────────────────────

export interface DataGuardConfig {
  readonly sampleRows: number;
}

export const DEFAULT_DATA_GUARD_CONFIG: DataGuardConfig = {
  sampleRows: DEFAULT_GUARD_SAMPLE_ROWS,
};

export interface DataGuardEngineDeps {
  readonly bus: EventBus<AutomationEvent>;
  /** Directory that relative dataset ids resolve under. */
  readonly datasetsDir: string;
  readonly fs?: DataGuardFileSystem;
  readonly logger?: Logger;
  readonly config?: Partial<DataGuardConfig>;
}

/**
 * Profiles a finished dataset, writes `GuardReport.md` beside it and feeds
 * the result back to automation as a `run_finished` event.
 */
export class DataGuardEngine {
  private readonly bus: EventBus<AutomationEvent>;
  private readonly datasetsDir: string;
  private readonly fs: DataGuardFileSystem;
  private readonly logger: Logger;
  private readonly config: DataGuardConfig;

  constructor(deps: DataGuardEngineDeps) {
    this.bus = deps.bus;
    this.datasetsDir = deps.datasetsDir;
    this.fs = deps.fs ?? NODE_DATA_GUARD_FILE_SYSTEM;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "data-guards" });
    this.config = { ...DEFAULT_DATA_GUARD_CONFIG, ...deps.config };
  }

  /** Throws when the dataset cannot be read or the report cannot be written. */
  async run(datasetPath: string, madeImages: boolean): Promise<GuardMetrics> {
    const metrics = computeGuardMetrics(
      await this.fs.readFile(datasetPath),
      this.config.sampleRows,
    );

    const directory = dirname(datasetPath);
    const reportPath = join(directory, GUARD_REPORT_NAME);
    await this.fs.mkdir(directory);
    await this.fs.writeFile(reportPath, formatGuardReport(metrics));
    this.logger.info("data_guard_report_written", {
      path: reportPath,
      nullPercentage: metrics.nullPercentage,
      duplicateRatio: metrics.duplicateRatio,
    });

    this.bus.publish({
      type: "run_finished",
      stats: {
        dataset: datasetPath,
        artifacts: [GUARD_REPORT_NAME],
        nullPercentage: metrics.nullPercentage,
        madeImages,
      },
    });
    return metrics;
  }

  /**
   * Guard the first of `datasetIds`. Failures are published as
   * `error_occurred` instead of thrown.
   */
  async process(datasetIds: readonly string[], madeImages: boolean): Promise<GuardMetrics | null> {
    const first = datasetIds[0];
    if (first === undefined) return null;
    const path = this.resolve(first);

    try {
      return await this.run(path, madeImages);
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.warn("data_guard_failed", { path, error: message });
      this.bus.publish({ type: "error_occurred", error: new AppError("autoflow", message) });
      return null;
    }
  }

  resolve(datasetId: string): string {
    return isAbsolute(datasetId) ? datasetId : join(this.datasetsDir, datasetId);
  }
}
