import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { FieldReader, isOneOf } from "../runtime/validation.ts";
import { AgentRuntimeError, materializeArtifact } from "../crew/agent-runtime.ts";
import type { AgentContext, AgentResult, AgentRuntime } from "../crew/agent-runtime.ts";
import { createFact, factText } from "../crew/blackboard.ts";
import { ARTIFACT_TYPES, FACT_TYPES } from "../crew/types.ts";
import type { Artifact, ArtifactType, Fact, FactType, ProposedTask, TaskKind } from "../crew/types.ts";
import type { ClaudeClient } from "./claude-client.ts";
import { DEFAULT_AGENT_MODEL } from "./claude-client.ts";

// ── Config ───────────────────────────────────────────────────────────────────

export interface ClaudeAgentRuntimeConfig {
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  /** Longest fact text quoted back into a prompt. */
  readonly maxFactChars: number;
}

export const DEFAULT_CLAUDE_AGENT_CONFIG: ClaudeAgentRuntimeConfig = {
  model: DEFAULT_AGENT_MODEL,
  maxTokens: 4096,
  timeoutMs: 60_000,
  maxFactChars: 2000,
};

// ── Task Briefs ──────────────────────────────────────────────────────────────

const TASK_BRIEFS: Record<TaskKind, string> = {
  plan: "Draft a short analysis plan as markdown. Return it as artifact plan.md and as fact plan.",
  schemaInfer:
    "Describe the likely schema of the listed datasets: columns, types, keys. Return it as fact schema.",
  codeGen: "Write the notebook cells the analysis needs. Return them as a markdown artifact.",
  pythonRun:
    "Describe the chart or fix the intents ask for. A rendered chart is returned as an image_png artifact with base64 content.",
  critique:
    "Review the named artifacts. Report blocking problems as fact issue; otherwise return fact critique.",
  synthesis: "Write the final report as artifact report.md and mark the run finished with fact done.",
};

/** Facts a task kind must leave behind for the crew to move on. */
const MILESTONE_FACTS: Partial<Record<TaskKind, { readonly key: string; readonly type: FactType }>> = {
  plan: { key: "plan", type: "summary" },
  schemaInfer: { key: "schema", type: "schema" },
  synthesis: { key: "done", type: "done" },
};

const SYSTEM_PROMPT = [
  "You are one member of a data-analysis crew working on a shared blackboard.",
  "Reply with a single JSON object and nothing else:",
  '{"messages": [string], "facts": [{"key": string, "type": string, "value": string}],',
  ' "artifacts": [{"name": string, "type": string, "content": string}]}',
  `Fact types: ${FACT_TYPES.join(", ")}. Artifact types: ${ARTIFACT_TYPES.join(", ")}.`,
].join("\n");

// ── Claude Agent Runtime ─────────────────────────────────────────────────────

export class ClaudeAgentRuntime implements AgentRuntime {
  private readonly config: ClaudeAgentRuntimeConfig;
  private readonly logger: Logger;

  constructor(
    private readonly client: ClaudeClient,
    options: { readonly config?: Partial<ClaudeAgentRuntimeConfig>; readonly logger?: Logger } = {},
  ) {
    this.config = { ...DEFAULT_CLAUDE_AGENT_CONFIG, ...options.config };
    this.logger = (options.logger ?? NULL_LOGGER).child({ module: "claude-agent-runtime" });
  }

  async run(task: ProposedTask, context: AgentContext): Promise<AgentResult> {
    const response = await this.client.createMessage({
      model: this.config.model,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: this.buildPrompt(task, context) }],
      maxTokens: this.config.maxTokens,
      timeoutMs: this.config.timeoutMs,
      signal: context.signal,
    });

    if (response.content.trim().length === 0) {
      throw new AgentRuntimeError("Empty response", "RESPONSE_EMPTY", task.id);
    }

    const reply = parseAgentReply(response.content, task.id);
    const facts = reply.facts.map((f) => createFact({ key: f.key, type: f.type, value: f.value }));
    const milestone = MILESTONE_FACTS[task.kind];
    if (milestone && !facts.some((f) => f.key === milestone.key)) {
      facts.push(createFact({ ...milestone, value: reply.messages.join("\n") }));
    }

    const artifacts: Artifact[] = [];
    for (const item of reply.artifacts) {
      const body = item.type === "image_png" ? Buffer.from(item.content, "base64") : item.content;
      try {
        artifacts.push(
          await materializeArtifact(context, item.name, item.type, body, { owner: task.ownerRole }),
        );
      } catch (err: unknown) {
        throw new AgentRuntimeError(
          `Could not store artifact ${item.name}`,
          "ARTIFACT_WRITE_FAILED",
          task.id,
          err instanceof Error ? err : undefined,
        );
      }
    }

    this.logger.debug("agent_task_completed", {
      task: task.kind,
      facts: facts.length,
      artifacts: artifacts.length,
    });

    return {
      newFacts: facts,
      artifacts,
      messages: reply.messages,
      toolCalls: 1,
      tokens: response.inputTokens + response.outputTokens,
    };
  }

  private buildPrompt(task: ProposedTask, context: AgentContext): string {
    const { contract, blackboard } = context;
    const facts = blackboard.facts().map((fact) => `- ${fact.key} (${fact.type}): ${this.clip(fact)}`);
    const artifacts = blackboard.artifacts().map((a) => `- ${a.name} (${a.type})`);

    return [
      `<goal>\n${contract.goal}\n</goal>`,
      `<role>${task.ownerRole}</role>`,
      `<task kind="${task.kind}">\n${TASK_BRIEFS[task.kind]}\nInputs: ${task.inputs.join(", ") || "none"}\nIntents: ${task.intents.join(", ") || "none"}\n</task>`,
      `<facts>\n${facts.join("\n") || "none"}\n</facts>`,
      `<artifacts>\n${artifacts.join("\n") || "none"}\n</artifacts>`,
    ].join("\n\n");
  }

  private clip(fact: Fact): string {
    const text = factText(fact);
    return text.length > this.config.maxFactChars
      ? `${text.slice(0, this.config.maxFactChars)}…`
      : text;
  }
}

// ── Reply Parsing ────────────────────────────────────────────────────────────

export interface AgentReply {
  readonly messages: string[];
  readonly facts: { readonly key: string; readonly type: FactType; readonly value: string }[];
  readonly artifacts: { readonly name: string; readonly type: ArtifactType; readonly content: string }[];
}

/** Parse the model's JSON reply. A fenced ```json block is accepted. */
export function parseAgentReply(content: string, taskId: string): AgentReply {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  const jsonText = (fenced?.[1] ?? content).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch {
    throw new AgentRuntimeError("Reply is not valid JSON", "MALFORMED_OUTPUT", taskId);
  }

  const errors: string[] = [];
  const reply = FieldReader.of(parsed, "reply", errors);
  const messages = reply?.has("messages") ? reply.stringArray("messages") : [];
  const facts = (reply?.has("facts") ? reply.array("facts") : []) ?? [];
  const artifacts = (reply?.has("artifacts") ? reply.array("artifacts") : []) ?? [];

  const result: AgentReply = { messages: messages ?? [], facts: [], artifacts: [] };

  facts.forEach((item, i) => {
    const fields = FieldReader.of(item, `reply.facts[${i}]`, errors);
    const key = fields?.string("key");
    const type = fields?.oneOf("type", FACT_TYPES);
    const value = fields?.raw("value");
    if (key === undefined || type === undefined) return;
    result.facts.push({
      key,
      type,
      value: typeof value === "string" ? value : JSON.stringify(value ?? null),
    });
  });

  artifacts.forEach((item, i) => {
    const fields = FieldReader.of(item, `reply.artifacts[${i}]`, errors);
    const name = fields?.string("name");
    const rawType = fields?.raw("type");
    const content = fields?.raw("content");
    if (name === undefined) return;
    if (!isOneOf(ARTIFACT_TYPES, rawType)) {
      errors.push(`"reply.artifacts[${i}].type" must be one of: ${ARTIFACT_TYPES.join(", ")}`);
      return;
    }
    if (typeof content !== "string") {
      errors.push(`"reply.artifacts[${i}].content" must be a string`);
      return;
    }
    result.artifacts.push({ name, type: rawType, content });
  });

  if (errors.length > 0) {
    throw new AgentRuntimeError(`Malformed reply: ${errors.join("; ")}`, "MALFORMED_OUTPUT", taskId);
  }
  return result;
}
