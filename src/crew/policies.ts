import { randomUUID } from "node:crypto";
import type { Blackboard } from "./blackboard.ts";
import type { Validator } from "./validator.ts";
import type { BlackboardEvent, PlanContract, ProposedTask, TaskKind } from "./types.ts";

// ── Policy Interface ────────────────────────────────────────────────────────

export interface PolicyContext {
  readonly blackboard: Blackboard;
  readonly contract: PlanContract;
  readonly validator: Validator;
}

/**
 * Reacts to one blackboard event by proposing zero or more tasks. Policies
 * look at the blackboard before proposing, so an unchanged blackboard never
 * yields the same milestone twice.
 */
export interface Policy {
  readonly name: string;
  evaluate(event: BlackboardEvent, ctx: PolicyContext): Promise<ProposedTask[]>;
}

function propose(
  ownerRole: string,
  kind: TaskKind,
  inputs: readonly string[],
  intents: readonly string[],
  priority: number,
): ProposedTask {
  return { id: randomUUID(), ownerRole, kind, inputs, intents, priority };
}

// ── Default Policies ────────────────────────────────────────────────────────

export const bootPolicy: Policy = {
  name: "BootPolicy",
  async evaluate(event, { blackboard }) {
    if (event.type !== "fact_upserted" || event.key !== "goal") return [];
    if (blackboard.fact("plan")) return [];
    return [propose("Planner", "plan", ["goal"], ["plan.md"], 100)];
  },
};

export const edaPolicy: Policy = {
  name: "EDAPolicy",
  async evaluate(event, { blackboard }) {
    if (event.type !== "fact_upserted") return [];
    if (!blackboard.hasFact((f) => f.type === "dataset_list")) return [];
    if (blackboard.hasFact((f) => f.type === "schema")) return [];
    return [propose("Analyst", "schemaInfer", ["dataset_list"], ["schema"], 90)];
  },
};

export const plotPolicy: Policy = {
  name: "PlotPolicy",
  async evaluate(event, { blackboard }) {
    if (event.type !== "fact_upserted") return [];
    if (!blackboard.hasFact((f) => f.type === "schema")) return [];
    if (blackboard.artifacts((a) => a.type === "image_png").length > 0) return [];
    return [propose("Coder", "pythonRun", ["schema"], ["plot"], 80)];
  },
};

export const critiquePolicy: Policy = {
  name: "CritiquePolicy",
  async evaluate(event) {
    if (event.type === "artifact_added") {
      return [propose("Critic", "critique", [event.name], ["issues"], 70)];
    }
    if (event.type === "fact_upserted" && event.key === "issue") {
      return [propose("Coder", "pythonRun", ["issue"], ["fix"], 75)];
    }
    return [];
  },
};

export const synthesisPolicy: Policy = {
  name: "SynthesisPolicy",
  async evaluate(event, { blackboard, contract, validator }) {
    if (event.type !== "fact_upserted") return [];
    if (blackboard.hasFact((f) => f.type === "done")) return [];
    const failures = await validator.failures(contract.qualityGates, blackboard);
    if (failures.length > 0) return [];
    return [propose("Editor", "synthesis", ["plan"], ["report"], 60)];
  },
};

export function defaultPolicies(): Policy[] {
  return [bootPolicy, edaPolicy, plotPolicy, critiquePolicy, synthesisPolicy];
}

// ── Policy Engine ───────────────────────────────────────────────────────────

export class PolicyEngine {
  constructor(readonly policies: readonly Policy[] = defaultPolicies()) {}

  /** Every policy's proposals, in policy list order. */
  async propose(event: BlackboardEvent, ctx: PolicyContext): Promise<ProposedTask[]> {
    const proposals: ProposedTask[] = [];
    for (const policy of this.policies) {
      proposals.push(...(await policy.evaluate(event, ctx)));
    }
    return proposals;
  }

  /** Highest priority wins; on a tie the earliest proposal wins. */
  select(proposals: readonly ProposedTask[]): ProposedTask | null {
    let best: ProposedTask | null = null;
    for (const task of proposals) {
      if (!best || task.priority > best.priority) {
        best = task;
      }
    }
    return best;
  }
}
