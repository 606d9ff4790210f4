import type { Blackboard } from "./blackboard.ts";
import { createArtifact, createFact, decodeFactValue } from "./blackboard.ts";
import type { CrewStore } from "./crew-store.ts";
import type { Artifact, ArtifactType, Fact, PlanContract, ProposedTask } from "./types.ts";
import { abortReason } from "../runtime/cancellation.ts";

// ── Agent Runtime Interface ─────────────────────────────────────────────────

export interface AgentContext {
  readonly contract: PlanContract;
  readonly blackboard: Blackboard;
  readonly store?: CrewStore;
  readonly signal?: AbortSignal;
}

export interface AgentResult {
  readonly newFacts: readonly Fact[];
  readonly artifacts: readonly Artifact[];
  readonly messages: readonly string[];
  readonly toolCalls: number;
  readonly tokens: number;
}

/** Executes one task. Errors are propagated as thrown, never interpreted. */
export interface AgentRuntime {
  run(task: ProposedTask, context: AgentContext): Promise<AgentResult>;
}

// ── Error ───────────────────────────────────────────────────────────────────

export type AgentRuntimeErrorCode =
  | "API_ERROR"
  | "RATE_LIMITED"
  | "TIMEOUT"
  | "ABORTED"
  | "RESPONSE_EMPTY"
  | "MALFORMED_OUTPUT"
  | "ARTIFACT_WRITE_FAILED";

export class AgentRuntimeError extends Error {
  override readonly name = "AgentRuntimeError";

  constructor(
    message: string,
    readonly code: AgentRuntimeErrorCode,
    readonly taskId: string,
    override readonly cause?: Error,
  ) {
    super(message);
  }
}

// ── Artifact Output ─────────────────────────────────────────────────────────

/**
 * Store the body through the run's store when there is one; otherwise the
 * artifact path is just its name.
 */
export async function materializeArtifact(
  context: AgentContext,
  name: string,
  type: ArtifactType,
  body: string | Uint8Array,
  meta: Record<string, string> = {},
): Promise<Artifact> {
  const path = context.store ? await context.store.registerArtifact(name, body) : name;
  return createArtifact(name, type, path, meta);
}

// ── Scripted Runtime ────────────────────────────────────────────────────────

const SCRIPTED_TOKENS_PER_TASK = 256;

/** 8-byte PNG signature; stands in for a rendered chart. */
const PLACEHOLDER_PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Deterministic offline runtime. Each task kind produces a fixed output, so
 * a crew driven by the default policies always reaches its report.
 */
export class ScriptedAgentRuntime implements AgentRuntime {
  async run(task: ProposedTask, context: AgentContext): Promise<AgentResult> {
    if (context.signal?.aborted) {
      throw abortReason(context.signal);
    }

    const facts: Fact[] = [];
    const artifacts: Artifact[] = [];
    const messages: string[] = [];

    switch (task.kind) {
      case "plan": {
        const planText = [
          "# Plan",
          `- Understand ${context.contract.goal}`,
          "- Explore datasets",
          "- Produce report",
        ].join("\n");
        artifacts.push(
          await materializeArtifact(context, "plan.md", "markdown", planText, {
            owner: task.ownerRole,
          }),
        );
        facts.push(createFact({ key: "plan", type: "summary", value: planText }));
        messages.push("Planner drafted plan.md");
        break;
      }
      case "schemaInfer": {
        const names = datasetNames(context.blackboard);
        const suffix = names.length > 0 ? ` for ${names.join(", ")}` : "";
        facts.push(
          createFact({
            key: "schema",
            type: "schema",
            value: `Detected schema with inferred numeric + categorical columns${suffix}`,
          }),
        );
        messages.push("Analyst inferred schema");
        break;
      }
      case "codeGen":
        messages.push("Coder prepared notebook cells");
        break;
      case "pythonRun":
        artifacts.push(
          await materializeArtifact(context, "plot.png", "image_png", PLACEHOLDER_PNG, {
            intent: task.intents[0] ?? "",
          }),
        );
        messages.push("Python run produced artifact");
        break;
      case "critique":
        facts.push(createFact({ key: "critique", type: "summary", value: "No blocking issues" }));
        messages.push("Critic reviewed artifacts");
        break;
      case "synthesis": {
        const report = "## Report\nAll deliverables produced.";
        artifacts.push(await materializeArtifact(context, "report.md", "markdown", report));
        facts.push(createFact({ key: "done", type: "done", value: report }));
        messages.push("Editor synthesized report");
        break;
      }
    }

    return {
      newFacts: facts,
      artifacts,
      messages,
      toolCalls: 1,
      tokens: SCRIPTED_TOKENS_PER_TASK,
    };
  }
}

/** Dataset file names recorded on the blackboard. */
export function datasetNames(blackboard: Blackboard): string[] {
  const fact = blackboard.fact("dataset_list");
  const value = fact ? decodeFactValue(fact.value) : undefined;
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}
