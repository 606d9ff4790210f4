import { basename } from "node:path";
import type { Application } from "../bootstrap.ts";
import { defaultContract } from "../crew/contract.ts";
import { runCrew } from "../crew/run-crew.ts";
import type { CrewRunResult, PlanContract } from "../crew/types.ts";
import type { GuardMetrics } from "../automation/data-guards.ts";
import type { Subscription } from "../events/event-bus.ts";
import type { EnginePhase, EngineStatus } from "../automation/types.ts";

// ── Crew Goal ────────────────────────────────────────────────────────────────

export interface GoalRunOptions {
  readonly datasets?: readonly string[];
  /** Replaces the default contract built from the goal and the app budgets. */
  readonly contract?: PlanContract;
  readonly dryRun?: boolean;
  /** Guard the first dataset after a completed run. Default true. */
  readonly guard?: boolean;
  readonly signal?: AbortSignal;
}

export type GoalResult =
  | { readonly kind: "dry_run"; readonly contract: PlanContract; readonly datasets: readonly string[] }
  | {
      readonly kind: "run";
      readonly contract: PlanContract;
      readonly result: CrewRunResult;
      /** Null when no guard ran or it failed. */
      readonly guard: GuardMetrics | null;
    };

/**
 * Run one crew over the given datasets with the application's agent runtime.
 * A dry run only resolves the contract. A completed run is followed by the
 * data guards, whose `run_finished` event reaches the automation engine.
 */
export async function runGoal(
  app: Application,
  goal: string,
  options: GoalRunOptions = {},
): Promise<GoalResult> {
  const contract = options.contract ?? defaultContract(goal, app.budgets);
  const datasets = options.datasets ?? [];

  if (options.dryRun) {
    app.logger.info("goal_dry_run", {
      goal: contract.goal,
      datasets: datasets.map((d) => basename(d)),
      deliverables: contract.requiredDeliverables.map((d) => d.name),
    });
    return { kind: "dry_run", contract, datasets };
  }

  const { result, blackboard } = await runCrew({
    contract,
    agentRuntime: app.agentRuntime,
    workspaceDir: app.config.workspace.rootDir,
    datasets,
    writer: app.writer,
    logger: app.logger,
    signal: options.signal,
  });

  let guard: GuardMetrics | null = null;
  if (options.guard !== false && result.status === "completed") {
    const madeImages = blackboard.artifacts((a) => a.type === "image_png").length > 0;
    guard = await app.guards.process(datasets, madeImages);
  }
  return { kind: "run", contract, result, guard };
}

// ── Dataset Mount ────────────────────────────────────────────────────────────

/**
 * Post a dataset-mounted event and resolve with the phase the automation
 * engine settles in once it has handled it.
 */
export async function mountDataset(
  app: Application,
  path: string,
  sizeBytes: number,
): Promise<EnginePhase> {
  const statuses = app.engine.subscribeStatus();
  try {
    app.orchestrator.post({ type: "dataset_mounted", path, sizeBytes });
    return await settledPhase(statuses);
  } finally {
    statuses.close();
  }
}

/** First idle, paused or blocked phase after the engine started evaluating. */
export async function settledPhase(statuses: Subscription<EngineStatus>): Promise<EnginePhase> {
  let evaluated = false;
  for await (const { phase } of statuses) {
    if (phase.kind === "evaluating" || phase.kind === "running") {
      evaluated = true;
    } else if (evaluated) {
      return phase;
    }
  }
  throw new Error("Automation engine closed before the event was handled");
}
