// ── Facts ────────────────────────────────────────────────────────────────────

export const FACT_TYPES = [
  "goal",
  "dataset_list",
  "schema",
  "summary",
  "issue",
  "metric",
  "done",
  "error",
] as const;

export type FactType = (typeof FACT_TYPES)[number];

export interface Fact {
  readonly id: string;
  /** Unique within a blackboard; a second upsert with the same key replaces the first. */
  readonly key: string;
  readonly type: FactType;
  readonly value: Uint8Array;
  /** ISO-8601 */
  readonly createdAt: string;
  readonly ttlSeconds?: number;
}

// ── Artifacts ────────────────────────────────────────────────────────────────

export const ARTIFACT_TYPES = ["table_json", "image_png", "markdown", "json", "csv"] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export interface Artifact {
  readonly id: string;
  readonly name: string;
  readonly type: ArtifactType;
  readonly path: string;
  readonly meta: Readonly<Record<string, string>>;
}

// ── Blackboard Events ────────────────────────────────────────────────────────

export type BlackboardEvent =
  | { readonly type: "fact_upserted"; readonly key: string }
  | { readonly type: "artifact_added"; readonly name: string }
  | { readonly type: "warning"; readonly message: string }
  | { readonly type: "error"; readonly message: string };

// ── Tasks ────────────────────────────────────────────────────────────────────

export const TASK_KINDS = [
  "plan",
  "schemaInfer",
  "codeGen",
  "pythonRun",
  "critique",
  "synthesis",
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export interface ProposedTask {
  readonly id: string;
  readonly ownerRole: string;
  readonly kind: TaskKind;
  readonly inputs: readonly string[];
  readonly intents: readonly string[];
  /** Higher runs first. */
  readonly priority: number;
}

/** Tool a task kind needs from the contract's allow-list, if any. */
export const TASK_TOOL_REQUIREMENTS: Partial<Record<TaskKind, string>> = {
  pythonRun: "python.execute",
  codeGen: "notebook.write",
};

// ── Contract ─────────────────────────────────────────────────────────────────

export interface Budgets {
  readonly wallClockSec: number;
  readonly maxToolCalls: number;
  readonly maxTokensTotal: number;
}

export interface Deliverable {
  readonly name: string;
  readonly type: string;
}

export type QualityRule =
  | { readonly kind: "minImages"; readonly count: number }
  | { readonly kind: "tableHasCols"; readonly table: string; readonly cols: readonly string[] }
  | { readonly kind: "maxNullPct"; readonly column: string; readonly pct: number };

export interface QualityGate {
  readonly name: string;
  readonly rule: QualityRule;
}

export interface PlanContract {
  readonly goal: string;
  readonly allowedTools: readonly string[];
  readonly requiredDeliverables: readonly Deliverable[];
  readonly budgets: Budgets;
  readonly qualityGates: readonly QualityGate[];
}

// ── Run Result ───────────────────────────────────────────────────────────────

export const CREW_RUN_STATUSES = [
  "completed",
  "stalled",
  "budget_exhausted",
  "failed",
  "cancelled",
] as const;

export type CrewRunStatus = (typeof CREW_RUN_STATUSES)[number];

export interface CrewRunResult {
  readonly runId: string;
  readonly status: CrewRunStatus;
  /** Blackboard events consumed by the drive loop. */
  readonly ticks: number;
  readonly toolCalls: number;
  readonly tokens: number;
  readonly durationMs: number;
  /** Quality-gate failures at the end of the run. */
  readonly gateFailures: readonly string[];
  /** Contract deliverables no artifact was produced for. */
  readonly missingDeliverables: readonly string[];
  readonly error?: string;
}
