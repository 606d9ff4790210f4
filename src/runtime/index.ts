// ── Cancellation ─────────────────────────────────────────────────────────────
export {
  TimeoutError,
  OperationCancelledError,
  abortReason,
  cancellableSleep,
  MAX_TIMER_DELAY_MS,
  type TimeoutOptions,
  withTimeout,
} from "./cancellation.ts";

// ── Validation ───────────────────────────────────────────────────────────────
export {
  isRecord,
  isOneOf,
  type NumberBounds,
  FieldReader,
} from "./validation.ts";

// ── Goal & Mount ─────────────────────────────────────────────────────────────
export {
  type GoalRunOptions,
  type GoalResult,
  runGoal,
  mountDataset,
  settledPhase,
} from "./run-goal.ts";
