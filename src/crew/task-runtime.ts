import type { AgentRuntime } from "./agent-runtime.ts";
import type { Blackboard } from "./blackboard.ts";
import type { CrewStore, TaskOutcome } from "./crew-store.ts";
import type { PlanContract, ProposedTask } from "./types.ts";

/**
 * Runs one task through the agent runtime and applies its output to the
 * blackboard: facts first, then artifacts. No retries; agent errors reach the
 * caller unchanged.
 */
export class TaskRuntime {
  constructor(
    private readonly agentRuntime: AgentRuntime,
    private readonly store?: CrewStore,
  ) {}

  async execute(
    task: ProposedTask,
    contract: PlanContract,
    blackboard: Blackboard,
    signal?: AbortSignal,
  ): Promise<TaskOutcome> {
    const result = await this.agentRuntime.run(task, {
      contract,
      blackboard,
      store: this.store,
      signal,
    });

    for (const fact of result.newFacts) {
      blackboard.upsertFact(fact);
    }
    for (const artifact of result.artifacts) {
      blackboard.addArtifact(artifact);
    }

    const outcome: TaskOutcome = { toolCalls: result.toolCalls, tokens: result.tokens };
    await this.store?.appendTask({ task, messages: result.messages, outcome });
    return outcome;
  }
}
