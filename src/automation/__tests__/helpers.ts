import { EventBus } from "../../events/event-bus.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { JsonLinesLog } from "../../observability/run-log.ts";
import { AutomationEngine } from "../automation-engine.ts";
import type { AutomationEngineConfig } from "../automation-engine.ts";
import { GuardrailState } from "../guardrail-state.ts";
import type { SettingsFileSystem } from "../settings-store.ts";
import type { DataGuardFileSystem } from "../data-guards.ts";
import type { GuardrailInit } from "../guardrail-state.ts";
import type {
  AutomationEvent,
  AutomationPreferences,
  EngineStatus,
  Playbook,
  PlaybookRunner,
} from "../types.ts";
import { DEFAULT_TOGGLES, describePhase } from "../types.ts";
import type { Subscription } from "../../events/event-bus.ts";
import {
  createManualClock,
  MemoryLogFileWriter,
  type ManualClock,
} from "../../observability/__tests__/helpers.ts";

// ── Event Builders ──────────────────────────────────────────────────────────

export function mounted(path = "/data/sales.csv", sizeMB = 12): AutomationEvent {
  return { type: "dataset_mounted", dataset: { path, sizeMB } };
}

export function finished(
  overrides: Partial<{
    dataset: string | null;
    artifacts: string[];
    nullPercentage: number;
    madeImages: boolean;
  }> = {},
): AutomationEvent {
  return {
    type: "run_finished",
    stats: {
      dataset: "/data/sales.csv",
      artifacts: [],
      nullPercentage: 0,
      madeImages: true,
      ...overrides,
    },
  };
}

export function preferences(overrides: Partial<AutomationPreferences> = {}): AutomationPreferences {
  return {
    profile: "balanced",
    toggles: DEFAULT_TOGGLES,
    killSwitch: false,
    pausedUntil: null,
    ...overrides,
  };
}

// ── Controlled Runner ───────────────────────────────────────────────────────

/**
 * Playbook runner whose behavior each test picks: succeed, fail, or hang
 * until the signal aborts.
 */
export class ControlledRunner implements PlaybookRunner {
  readonly runs: Playbook[] = [];
  readonly signals: AbortSignal[] = [];
  stopCalls = 0;
  mode: "succeed" | "fail" | "hang" = "succeed";
  failure: Error = new Error("runner exploded");

  async run(playbook: Playbook, signal: AbortSignal): Promise<void> {
    this.runs.push(playbook);
    this.signals.push(signal);
    if (this.mode === "fail") {
      throw this.failure;
    }
    if (this.mode === "hang") {
      await new Promise<void>((_, reject) => {
        signal.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    }
  }

  async stopCurrentRun(): Promise<void> {
    this.stopCalls++;
  }
}

// ── Engine Context ──────────────────────────────────────────────────────────

export const ELOG_PATH = "/work/autoflow/elog.jsonl";

export interface EngineTestContext {
  engine: AutomationEngine;
  bus: EventBus<AutomationEvent>;
  runner: ControlledRunner;
  state: GuardrailState;
  writer: MemoryLogFileWriter;
  runLog: JsonLinesLog;
  logger: BufferLogger;
  clock: ManualClock;
  /** Parsed run-log lines, after pending writes finish. */
  logLines(): Promise<Record<string, unknown>[]>;
}

export function createEngineTestContext(
  options: {
    guardrail?: GuardrailInit;
    config?: Partial<AutomationEngineConfig>;
  } = {},
): EngineTestContext {
  const clock = createManualClock();
  const writer = new MemoryLogFileWriter();
  const logger = BufferLogger.create();
  const runLog = new JsonLinesLog(ELOG_PATH, { writer, logger, now: clock.fn });
  const bus = new EventBus<AutomationEvent>();
  const runner = new ControlledRunner();
  const state = new GuardrailState({ profile: "balanced", ...options.guardrail });
  const engine = new AutomationEngine({
    bus,
    runner,
    state,
    runLog,
    logger,
    clock: clock.fn,
    config: options.config,
  });
  return {
    engine,
    bus,
    runner,
    state,
    writer,
    runLog,
    logger,
    clock,
    async logLines() {
      await runLog.flush();
      return writer.lines(ELOG_PATH);
    },
  };
}

/** Every phase delivered so far, in compact text form. */
export function phases(statuses: Subscription<EngineStatus>): string[] {
  return statuses.drain().map((status) => describePhase(status.phase));
}

// ── Settings File System ────────────────────────────────────────────────────

export class MemorySettingsFileSystem implements SettingsFileSystem {
  readonly files = new Map<string, string>();
  readonly dirs: string[] = [];

  async readFile(path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  async mkdir(path: string): Promise<void> {
    this.dirs.push(path);
  }
}

// ── Data Guard File System ──────────────────────────────────────────────────

export class MemoryDataGuardFileSystem implements DataGuardFileSystem {
  readonly files = new Map<string, string>();
  readonly dirs: string[] = [];

  async readFile(path: string): Promise<string> {
    const text = this.files.get(path);
    if (text === undefined) throw new Error(`ENOENT: ${path}`);
    return text;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  async mkdir(path: string): Promise<void> {
    this.dirs.push(path);
  }
}
