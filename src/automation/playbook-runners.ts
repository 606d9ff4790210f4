import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { AppError } from "../types/errors.ts";
import { abortReason, OperationCancelledError } from "../runtime/cancellation.ts";
import type { AgentRuntime } from "../crew/agent-runtime.ts";
import { DEFAULT_BUDGETS, defaultContract } from "../crew/contract.ts";
import type { CrewFileWriter } from "../crew/crew-store.ts";
import { runCrew } from "../crew/run-crew.ts";
import type { Budgets, PlanContract } from "../crew/types.ts";
import type { Playbook, PlaybookRunner } from "./types.ts";

// ── Noop Runner ─────────────────────────────────────────────────────────────

/** Accepts every playbook and does nothing. Used when automation runs detached. */
export class NoopPlaybookRunner implements PlaybookRunner {
  readonly runs: Playbook[] = [];

  async run(playbook: Playbook): Promise<void> {
    this.runs.push(playbook);
  }

  async stopCurrentRun(): Promise<void> {}
}

// ── Crew Runner ─────────────────────────────────────────────────────────────

export interface CrewPlaybookRunnerDeps {
  readonly agentRuntime: AgentRuntime;
  readonly workspaceDir?: string;
  readonly budgets?: Budgets;
  readonly writer?: CrewFileWriter;
  readonly logger?: Logger;
}

/** Contract for running a playbook as a crew. `mode=plots` requires a chart. */
export function playbookContract(playbook: Playbook, budgets: Budgets = DEFAULT_BUDGETS): PlanContract {
  const base = defaultContract(`${playbook.identifier}: ${playbook.description}`, budgets);
  return {
    ...base,
    qualityGates:
      playbook.parameters["mode"] === "plots"
        ? [{ name: "plots", rule: { kind: "minImages", count: 1 } }]
        : [],
  };
}

/**
 * Runs each playbook as a crew over the playbook's dataset. Anything short
 * of a completed crew run rejects, so the automation engine counts it as a
 * failure.
 */
export class CrewPlaybookRunner implements PlaybookRunner {
  private readonly logger: Logger;
  private current: AbortController | null = null;

  constructor(private readonly deps: CrewPlaybookRunnerDeps) {
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "crew-playbook-runner" });
  }

  async run(playbook: Playbook, signal: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(abortReason(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    this.current = controller;

    try {
      const { result } = await runCrew({
        contract: playbookContract(playbook, this.deps.budgets),
        agentRuntime: this.deps.agentRuntime,
        workspaceDir: this.deps.workspaceDir,
        datasets: playbook.dataset ? [playbook.dataset] : [],
        writer: this.deps.writer,
        logger: this.deps.logger,
        signal: controller.signal,
      });

      this.logger.info("playbook_crew_finished", {
        playbook: playbook.identifier,
        runId: result.runId,
        status: result.status,
      });

      switch (result.status) {
        case "completed":
          return;
        case "cancelled":
          throw abortReason(controller.signal);
        case "budget_exhausted":
          throw new AppError("crewBudget", `Crew run ${result.runId} stopped at budget limit`);
        case "failed":
          throw new AppError("autoflow", result.error ?? `Crew run ${result.runId} failed`);
        case "stalled":
          throw new AppError(
            "autoflow",
            `Crew run ${result.runId} stalled: ${result.gateFailures.join("; ") || "no further work"}`,
          );
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
      if (this.current === controller) {
        this.current = null;
      }
    }
  }

  async stopCurrentRun(): Promise<void> {
    this.current?.abort(new OperationCancelledError("stopped"));
  }
}
