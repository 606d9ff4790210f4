import type { Logger } from "../observability/logger.ts";
import { FieldReader } from "../runtime/validation.ts";
import { errorMessage } from "../types/errors.ts";
import type { AgentRuntime } from "./agent-runtime.ts";
import { defaultContract, parseContract } from "./contract.ts";
import type { CrewFileWriter } from "./crew-store.ts";
import { runCrew } from "./run-crew.ts";
import type { Budgets, Fact, PlanContract } from "./types.ts";

// ── Tool Interface ──────────────────────────────────────────────────────────

export interface ToolInputSchema {
  readonly type: "object";
  readonly properties: Record<string, unknown>;
  readonly required: readonly string[];
}

/** A callable exposed to a chat model: JSON text in, JSON text out. */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  call(args: string, signal?: AbortSignal): Promise<string>;
}

export class ToolInputError extends Error {
  override readonly name = "ToolInputError";

  constructor(
    readonly toolName: string,
    readonly errors: readonly string[],
  ) {
    super(`Invalid arguments for ${toolName}: ${errors.join("; ")}`);
  }
}

// ── crew.run ────────────────────────────────────────────────────────────────

export interface CrewRunInput {
  readonly goal: string;
  readonly datasetIds: readonly string[];
  readonly contract: PlanContract | null;
}

export interface CrewRunOutput {
  readonly run_id: string;
  readonly status: string;
  /** `key:value` with the value as UTF-8 text, `<binary>` when it is not text. */
  readonly facts: string[];
  readonly artifacts: string[];
}

export interface CrewRunToolDeps {
  readonly agentRuntime: AgentRuntime;
  readonly workspaceDir?: string;
  /** Budgets for the default contract, when the caller supplies none. */
  readonly budgets?: Budgets;
  readonly writer?: CrewFileWriter;
  readonly logger?: Logger;
}

const TOOL_NAME = "crew.run";

export class CrewRunTool implements Tool {
  readonly name = TOOL_NAME;
  readonly description = "Start a local multi-agent run";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      goal: { type: "string" },
      dataset_ids: { type: "array", items: { type: "string" } },
      contract: { type: "object" },
    },
    required: ["goal"],
  };

  constructor(private readonly deps: CrewRunToolDeps) {}

  async call(args: string, signal?: AbortSignal): Promise<string> {
    const input = parseCrewRunInput(args);
    const contract = input.contract ?? defaultContract(input.goal, this.deps.budgets);

    const { result, blackboard } = await runCrew({
      contract,
      agentRuntime: this.deps.agentRuntime,
      workspaceDir: this.deps.workspaceDir,
      datasets: input.datasetIds,
      writer: this.deps.writer,
      logger: this.deps.logger,
      signal,
    });

    const output: CrewRunOutput = {
      run_id: result.runId,
      status: result.status,
      facts: blackboard.facts().map(describeFact),
      artifacts: blackboard.artifacts().map((a) => a.name),
    };
    return JSON.stringify(output);
  }
}

export function parseCrewRunInput(args: string): CrewRunInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(args);
  } catch (err: unknown) {
    throw new ToolInputError(TOOL_NAME, [errorMessage(err)]);
  }

  const errors: string[] = [];
  const fields = FieldReader.of(parsed, "args", errors);
  const goal = fields?.string("goal");
  const datasetIds = fields?.has("dataset_ids") ? fields.stringArray("dataset_ids") : [];
  if (!fields || goal === undefined || !datasetIds) {
    throw new ToolInputError(TOOL_NAME, errors);
  }

  const contract = fields.has("contract") ? parseContract(fields.raw("contract")) : null;
  return { goal, datasetIds, contract };
}

const strictDecoder = new TextDecoder("utf-8", { fatal: true });

function describeFact(fact: Fact): string {
  let text: string;
  try {
    text = strictDecoder.decode(fact.value);
  } catch {
    text = "<binary>";
  }
  return `${fact.key}:${text}`;
}
