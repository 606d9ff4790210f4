// ── Types ────────────────────────────────────────────────────────────────────
export {
  FACT_TYPES,
  type FactType,
  type Fact,
  ARTIFACT_TYPES,
  type ArtifactType,
  type Artifact,
  type BlackboardEvent,
  TASK_KINDS,
  type TaskKind,
  type ProposedTask,
  TASK_TOOL_REQUIREMENTS,
  type Budgets,
  type Deliverable,
  type QualityRule,
  type QualityGate,
  type PlanContract,
  CREW_RUN_STATUSES,
  type CrewRunStatus,
  type CrewRunResult,
} from "./types.ts";

// ── Blackboard ───────────────────────────────────────────────────────────────
export {
  encodeFactValue,
  decodeFactValue,
  factText,
  type FactInit,
  createFact,
  createArtifact,
  type BlackboardOptions,
  Blackboard,
} from "./blackboard.ts";

// ── Policies ─────────────────────────────────────────────────────────────────
export {
  type PolicyContext,
  type Policy,
  bootPolicy,
  edaPolicy,
  plotPolicy,
  critiquePolicy,
  synthesisPolicy,
  defaultPolicies,
  PolicyEngine,
} from "./policies.ts";

// ── Budget ───────────────────────────────────────────────────────────────────
export {
  type BudgetLimit,
  BudgetCounters,
} from "./budget.ts";

// ── Validator ────────────────────────────────────────────────────────────────
export {
  type ArtifactReader,
  NODE_ARTIFACT_READER,
  Validator,
} from "./validator.ts";

// ── Agent Runtime ────────────────────────────────────────────────────────────
export {
  type AgentContext,
  type AgentResult,
  type AgentRuntime,
  type AgentRuntimeErrorCode,
  AgentRuntimeError,
  materializeArtifact,
  ScriptedAgentRuntime,
  datasetNames,
} from "./agent-runtime.ts";

// ── Task Runtime ─────────────────────────────────────────────────────────────
export {
  TaskRuntime,
} from "./task-runtime.ts";

// ── Crew Store ───────────────────────────────────────────────────────────────
export {
  type CrewFileWriter,
  NODE_CREW_FILE_WRITER,
  type TaskOutcome,
  type CrewTaskRecord,
  type CrewStoreOptions,
  CrewStore,
} from "./crew-store.ts";

// ── Crew Engine ──────────────────────────────────────────────────────────────
export {
  type CrewEngineConfig,
  DEFAULT_CREW_ENGINE_CONFIG,
  type CrewEngineDeps,
  type CrewRunRequest,
  CrewEngine,
} from "./crew-engine.ts";

// ── Contract ─────────────────────────────────────────────────────────────────
export {
  ContractError,
  DEFAULT_ALLOWED_TOOLS,
  DEFAULT_BUDGETS,
  COMPAT_BUDGETS,
  defaultContract,
  type CrewDescription,
  contractFromCrewDescription,
  parseCrewDescription,
  parseContract,
  type TextFileReader,
  parseContractText,
  loadContract,
} from "./contract.ts";

// ── Run Crew ─────────────────────────────────────────────────────────────────
export {
  type RunCrewOptions,
  type CrewRun,
  runCrew,
} from "./run-crew.ts";

// ── Crew Run Tool ────────────────────────────────────────────────────────────
export {
  type ToolInputSchema,
  type Tool,
  ToolInputError,
  type CrewRunInput,
  type CrewRunOutput,
  type CrewRunToolDeps,
  CrewRunTool,
  parseCrewRunInput,
} from "./crew-run-tool.ts";
