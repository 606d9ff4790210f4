// ── Types ────────────────────────────────────────────────────────────────────
export {
  AUTOMATION_PROFILES,
  type AutomationProfile,
  type AutomationToggles,
  DEFAULT_TOGGLES,
  type AutomationPreferences,
  type MountedDataset,
  type RunStats,
  type AutomationEvent,
  type AutomationEventType,
  type Playbook,
  type AutomationAction,
  type GuardrailVerdict,
  type EnginePhase,
  type EngineStatus,
  IDLE,
  EVALUATING,
  running,
  paused,
  blocked,
  describePhase,
  type PlaybookRunner,
} from "./types.ts";

// ── Guardrail State ──────────────────────────────────────────────────────────
export {
  type GuardrailConfig,
  DEFAULT_GUARDRAIL_CONFIG,
  type GuardrailInit,
  GuardrailState,
} from "./guardrail-state.ts";

// ── Rule Engine ──────────────────────────────────────────────────────────────
export {
  type RuleContext,
  DEFAULT_NULL_THRESHOLD,
  MAX_AUTO_EDA_SIZE_MB,
  RULE_NAMES,
  createRuleContext,
  actionFor,
  cacheKey,
} from "./rule-engine.ts";

// ── Automation Engine ────────────────────────────────────────────────────────
export {
  type AutomationEngineConfig,
  DEFAULT_AUTOMATION_ENGINE_CONFIG,
  CACHED_REASON,
  type AutomationEngineDeps,
  AutomationEngine,
  verdictReason,
} from "./automation-engine.ts";

// ── Orchestrator ─────────────────────────────────────────────────────────────
export {
  type AppEvent,
  translateAppEvent,
  AutomationOrchestrator,
} from "./orchestrator.ts";

// ── Playbook Runners ─────────────────────────────────────────────────────────
export {
  NoopPlaybookRunner,
  type CrewPlaybookRunnerDeps,
  playbookContract,
  CrewPlaybookRunner,
} from "./playbook-runners.ts";

// ── Settings Store ───────────────────────────────────────────────────────────
export {
  type AutomationSettings,
  DEFAULT_AUTOMATION_SETTINGS,
  SettingsError,
  type SettingsFileSystem,
  NODE_SETTINGS_FILE_SYSTEM,
  parseSettings,
  type SettingsStoreOptions,
  AutomationSettingsStore,
} from "./settings-store.ts";

// ── Data Guards ──────────────────────────────────────────────────────────────
export {
  type GuardMetrics,
  GUARD_REPORT_NAME,
  DEFAULT_GUARD_SAMPLE_ROWS,
  computeGuardMetrics,
  formatGuardReport,
  type DataGuardFileSystem,
  NODE_DATA_GUARD_FILE_SYSTEM,
  type DataGuardConfig,
  DEFAULT_DATA_GUARD_CONFIG,
  type DataGuardEngineDeps,
  DataGuardEngine,
} from "./data-guards.ts";
