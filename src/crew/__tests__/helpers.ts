import { randomUUID } from "node:crypto";
import { ScriptedAgentRuntime } from "../agent-runtime.ts";
import type { AgentContext, AgentResult, AgentRuntime } from "../agent-runtime.ts";
import { defaultContract } from "../contract.ts";
import type { CrewFileWriter } from "../crew-store.ts";
import type { ArtifactReader } from "../validator.ts";
import type { BlackboardEvent, PlanContract, ProposedTask, TaskKind } from "../types.ts";
import type { Subscription } from "../../events/event-bus.ts";
import { MemoryLogFileWriter } from "../../observability/__tests__/helpers.ts";

// ── Builders ────────────────────────────────────────────────────────────────

export function task(kind: TaskKind, overrides: Partial<ProposedTask> = {}): ProposedTask {
  return {
    id: randomUUID(),
    ownerRole: "Tester",
    kind,
    inputs: [],
    intents: [],
    priority: 50,
    ...overrides,
  };
}

export function contract(overrides: Partial<PlanContract> = {}): PlanContract {
  return { ...defaultContract("Summarize sales"), ...overrides };
}

/** Every event delivered so far, as short strings. */
export function describeEvents(events: Subscription<BlackboardEvent>): string[] {
  return events.drain().map((event) => {
    switch (event.type) {
      case "fact_upserted":
        return `fact:${event.key}`;
      case "artifact_added":
        return `artifact:${event.name}`;
      case "warning":
      case "error":
        return `${event.type}:${event.message}`;
    }
  });
}

// ── Agent Runtime ───────────────────────────────────────────────────────────

type Handler = (task: ProposedTask, context: AgentContext) => Promise<AgentResult>;

/**
 * Scripted runtime whose behavior can be replaced per task kind. Records
 * the kind of every task it was asked to run.
 */
export class FakeAgentRuntime implements AgentRuntime {
  readonly kinds: TaskKind[] = [];
  private readonly scripted = new ScriptedAgentRuntime();
  private readonly handlers = new Map<TaskKind, Handler>();
  private fallback: Handler | null = null;

  on(kind: TaskKind, handler: Handler): this {
    this.handlers.set(kind, handler);
    return this;
  }

  /** Handler for every kind without its own. */
  onAny(handler: Handler): this {
    this.fallback = handler;
    return this;
  }

  run(task: ProposedTask, context: AgentContext): Promise<AgentResult> {
    this.kinds.push(task.kind);
    const handler = this.handlers.get(task.kind) ?? this.fallback;
    return handler ? handler(task, context) : this.scripted.run(task, context);
  }
}

/** Never settles until the signal aborts, then rejects with its reason. */
export function hang(_task: ProposedTask, context: AgentContext): Promise<AgentResult> {
  return new Promise<AgentResult>((_, reject) => {
    context.signal?.addEventListener("abort", () => reject(context.signal?.reason), {
      once: true,
    });
  });
}

// ── File Fakes ──────────────────────────────────────────────────────────────

export class MemoryCrewFileWriter extends MemoryLogFileWriter implements CrewFileWriter {
  readonly written = new Map<string, string | Uint8Array>();

  async writeFile(path: string, content: string | Uint8Array): Promise<void> {
    this.written.set(path, content);
  }
}

export class MemoryArtifactReader implements ArtifactReader {
  readonly texts = new Map<string, string>();

  async readText(path: string): Promise<string> {
    const text = this.texts.get(path);
    if (text === undefined) throw new Error(`ENOENT: ${path}`);
    return text;
  }
}
