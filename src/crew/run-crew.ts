import type { Logger } from "../observability/logger.ts";
import type { AgentRuntime } from "./agent-runtime.ts";
import { Blackboard } from "./blackboard.ts";
import { CrewEngine } from "./crew-engine.ts";
import type { CrewEngineConfig } from "./crew-engine.ts";
import { CrewStore } from "./crew-store.ts";
import type { CrewFileWriter } from "./crew-store.ts";
import { TaskRuntime } from "./task-runtime.ts";
import { Validator } from "./validator.ts";
import type { ArtifactReader } from "./validator.ts";
import type { CrewRunResult, PlanContract } from "./types.ts";

export interface RunCrewOptions {
  readonly contract: PlanContract;
  readonly agentRuntime: AgentRuntime;
  /** Root under which `crew-runs/<runId>/` is written. Omit to keep the run in memory. */
  readonly workspaceDir?: string;
  readonly datasets?: readonly string[];
  readonly signal?: AbortSignal;
  readonly writer?: CrewFileWriter;
  readonly artifactReader?: ArtifactReader;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  readonly config?: Partial<CrewEngineConfig>;
}

export interface CrewRun {
  readonly result: CrewRunResult;
  readonly blackboard: Blackboard;
  readonly store?: CrewStore;
}

/** Wire a fresh blackboard, store and engine for one crew run and drive it. */
export async function runCrew(options: RunCrewOptions): Promise<CrewRun> {
  const { contract, logger, clock } = options;
  const store =
    options.workspaceDir !== undefined
      ? new CrewStore(options.workspaceDir, { writer: options.writer, logger, clock })
      : undefined;
  await store?.persistContract(contract);

  const blackboard = new Blackboard({ clock });
  const engine = new CrewEngine({
    taskRuntime: new TaskRuntime(options.agentRuntime, store),
    validator: new Validator(options.artifactReader),
    logger,
    clock,
    config: options.config,
  });

  try {
    const result = await engine.run({
      contract,
      blackboard,
      datasets: options.datasets,
      store,
      signal: options.signal,
    });
    await store?.flush();
    return { result, blackboard, store };
  } finally {
    blackboard.close();
  }
}
