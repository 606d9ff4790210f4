import { basename } from "node:path";
import { randomUUID } from "node:crypto";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { EventBus } from "../events/event-bus.ts";
import type { Subscription } from "../events/event-bus.ts";
import { AppError, errorMessage, presentError } from "../types/errors.ts";
import { TimeoutError, withTimeout } from "../runtime/cancellation.ts";
import type { EnginePhase, EngineStatus } from "../automation/types.ts";
import { EVALUATING, IDLE, blocked, paused, running } from "../automation/types.ts";
import type { Blackboard } from "./blackboard.ts";
import { createFact, encodeFactValue } from "./blackboard.ts";
import { BudgetCounters } from "./budget.ts";
import type { CrewStore } from "./crew-store.ts";
import { PolicyEngine } from "./policies.ts";
import type { PolicyContext } from "./policies.ts";
import type { TaskRuntime } from "./task-runtime.ts";
import { Validator } from "./validator.ts";
import { TASK_TOOL_REQUIREMENTS } from "./types.ts";
import type {
  BlackboardEvent,
  CrewRunResult,
  CrewRunStatus,
  PlanContract,
  ProposedTask,
} from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface CrewEngineConfig {
  /** Consecutive task failures after which the run is abandoned. */
  readonly maxConsecutiveFailures: number;
}

export const DEFAULT_CREW_ENGINE_CONFIG: CrewEngineConfig = {
  maxConsecutiveFailures: 3,
};

// ── Dependencies ────────────────────────────────────────────────────────────

export interface CrewEngineDeps {
  readonly taskRuntime: TaskRuntime;
  readonly policyEngine?: PolicyEngine;
  readonly validator?: Validator;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  readonly config?: Partial<CrewEngineConfig>;
}

export interface CrewRunRequest {
  readonly contract: PlanContract;
  readonly blackboard: Blackboard;
  /** Dataset paths; only their file names are put on the blackboard. */
  readonly datasets?: readonly string[];
  readonly runId?: string;
  readonly store?: CrewStore;
  readonly signal?: AbortSignal;
}

interface DriveOutcome {
  readonly status: CrewRunStatus;
  readonly error?: string;
}

// ── Crew Engine ─────────────────────────────────────────────────────────────

/**
 * Blackboard drive loop. Each tick takes one blackboard event, lets every
 * policy propose work, and runs the single highest-priority task. The run
 * ends when a `done` fact appears, nothing is left to react to, a budget is
 * reached, tasks keep failing, or the caller aborts.
 */
export class CrewEngine {
  private readonly config: CrewEngineConfig;
  private readonly taskRuntime: TaskRuntime;
  private readonly policyEngine: PolicyEngine;
  private readonly validator: Validator;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private readonly statusBus = new EventBus<EngineStatus>();
  private current: EngineStatus = { phase: IDLE, lastActionAt: null };
  private active = false;

  constructor(deps: CrewEngineDeps) {
    this.config = { ...DEFAULT_CREW_ENGINE_CONFIG, ...deps.config };
    this.taskRuntime = deps.taskRuntime;
    this.policyEngine = deps.policyEngine ?? new PolicyEngine();
    this.validator = deps.validator ?? new Validator();
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "crew-engine" });
    this.clock = deps.clock ?? (() => new Date());
  }

  // ── Status ──────────────────────────────────────────────────────────────

  status(): EngineStatus {
    return this.current;
  }

  subscribeStatus(): Subscription<EngineStatus> {
    return this.statusBus.subscribe({ seed: this.current });
  }

  // ── Run ─────────────────────────────────────────────────────────────────

  async run(request: CrewRunRequest): Promise<CrewRunResult> {
    if (this.active) {
      throw new Error("A crew run is already in progress on this engine");
    }
    this.active = true;

    const { contract, blackboard, store } = request;
    const runId = request.runId ?? store?.runId ?? randomUUID();
    const counters = new BudgetCounters(contract.budgets, this.clock);
    const log = this.logger.child({ runId });
    const events = blackboard.events();

    log.info("crew_run_started", { goal: contract.goal, budgets: contract.budgets });
    void store?.append("run_started", { runId, goal: contract.goal });
    this.setPhase(EVALUATING);

    let ticks = 0;
    let outcome: DriveOutcome;
    try {
      blackboard.upsertFact(
        createFact({ key: "goal", type: "goal", value: encodeFactValue(contract.goal) }),
      );
      blackboard.upsertFact(
        createFact({
          key: "dataset_list",
          type: "dataset_list",
          value: encodeFactValue((request.datasets ?? []).map((path) => basename(path))),
        }),
      );

      outcome = await this.drive({
        events,
        ctx: { blackboard, contract, validator: this.validator },
        counters,
        log,
        onTick: () => {
          ticks++;
        },
        signal: request.signal,
      });
    } finally {
      events.close();
      this.active = false;
    }

    const gateFailures = await this.validator.failures(contract.qualityGates, blackboard);
    const missingDeliverables = contract.requiredDeliverables
      .filter((d) => !blackboard.latestArtifact(d.name))
      .map((d) => d.name);

    const result: CrewRunResult = {
      runId,
      status: outcome.status,
      ticks,
      toolCalls: counters.toolCalls,
      tokens: counters.tokens,
      durationMs: counters.elapsedMs(),
      gateFailures,
      missingDeliverables,
      error: outcome.error,
    };

    log.info("crew_run_finished", {
      status: result.status,
      ticks,
      toolCalls: result.toolCalls,
      tokens: result.tokens,
    });
    void store?.append("run_finished", { ...result });
    this.setPhase(finalPhase(outcome));
    return result;
  }

  // ── Drive Loop ──────────────────────────────────────────────────────────

  private async drive(loop: {
    readonly events: Subscription<BlackboardEvent>;
    readonly ctx: PolicyContext;
    readonly counters: BudgetCounters;
    readonly log: Logger;
    readonly onTick: () => void;
    readonly signal?: AbortSignal;
  }): Promise<DriveOutcome> {
    const { events, ctx, counters, log, signal } = loop;
    const { blackboard, contract } = ctx;
    let consecutiveFailures = 0;

    for (;;) {
      if (signal?.aborted) return { status: "cancelled" };
      if (blackboard.hasFact((f) => f.type === "done")) return { status: "completed" };

      const event = events.tryNext();
      if (event === undefined) return { status: "stalled" };
      loop.onTick();

      const proposals = await this.policyEngine.propose(event, ctx);
      const task = this.policyEngine.select(this.permitted(proposals, contract, blackboard));
      if (!task) continue;

      const limit = counters.exhausted();
      if (limit) {
        blackboard.emitWarning(`Budget exceeded before scheduling task ${task.id}`);
        log.warn("crew_budget_exhausted", { limit, task: task.kind });
        return { status: "budget_exhausted" };
      }

      this.setPhase(running(`${task.ownerRole}: ${task.kind}`));
      log.debug("crew_task_started", { task: task.kind, priority: task.priority });

      try {
        const outcome = await withTimeout(
          (taskSignal) => this.taskRuntime.execute(task, contract, blackboard, taskSignal),
          counters.remainingMs(),
          { signal },
        );
        counters.register(outcome.toolCalls, outcome.tokens);
        consecutiveFailures = 0;
        this.current = { phase: this.current.phase, lastActionAt: this.clock() };
      } catch (err: unknown) {
        if (signal?.aborted) return { status: "cancelled" };
        counters.register(1, 0);

        if (err instanceof TimeoutError) {
          blackboard.emitWarning(`Budget exceeded while running task ${task.id}`);
          log.warn("crew_task_timed_out", { task: task.kind, timeoutMs: err.timeoutMs });
          return { status: "budget_exhausted" };
        }

        const message = errorMessage(err);
        consecutiveFailures++;
        log.warn("crew_task_failed", { task: task.kind, error: message, consecutiveFailures });
        blackboard.emitError(`Task ${task.kind} failed: ${message}`);
        blackboard.upsertFact(
          createFact({ key: "error", type: "error", value: { task: task.kind, message } }),
        );
        if (consecutiveFailures >= this.config.maxConsecutiveFailures) {
          return { status: "failed", error: message };
        }
      }
    }
  }

  /** Drop tasks whose tool the contract does not allow, with a warning each. */
  private permitted(
    proposals: readonly ProposedTask[],
    contract: PlanContract,
    blackboard: Blackboard,
  ): ProposedTask[] {
    return proposals.filter((task) => {
      const tool = TASK_TOOL_REQUIREMENTS[task.kind];
      if (tool === undefined || contract.allowedTools.includes(tool)) return true;
      blackboard.emitWarning(`Skipping task ${task.kind}: tool ${tool} is not allowed`);
      return false;
    });
  }

  private setPhase(phase: EnginePhase): void {
    this.current = { phase, lastActionAt: this.current.lastActionAt };
    this.statusBus.publish(this.current);
  }
}

function finalPhase(outcome: DriveOutcome): EnginePhase {
  switch (outcome.status) {
    case "completed":
      return IDLE;
    case "stalled":
      return paused("No further work proposed");
    case "budget_exhausted":
      return blocked(presentError(new AppError("crewBudget", "Budget exhausted")));
    case "failed":
      return paused(outcome.error ?? "Crew run failed");
    case "cancelled":
      return paused("Cancelled");
  }
}
