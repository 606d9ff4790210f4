import type { AppError } from "../types/errors.ts";

// ── Profile & Toggles ────────────────────────────────────────────────────────

export const AUTOMATION_PROFILES = ["off", "balanced", "aggressive"] as const;
export type AutomationProfile = (typeof AUTOMATION_PROFILES)[number];

export interface AutomationToggles {
  readonly quickEDAOnMount: boolean;
  readonly cleanOnHighNulls: boolean;
  readonly plotsOnMissing: boolean;
}

export const DEFAULT_TOGGLES: AutomationToggles = {
  quickEDAOnMount: true,
  cleanOnHighNulls: true,
  plotsOnMissing: true,
};

/** Read-only snapshot handed to the rule engine for one decision. */
export interface AutomationPreferences {
  readonly profile: AutomationProfile;
  readonly toggles: AutomationToggles;
  readonly killSwitch: boolean;
  readonly pausedUntil: Date | null;
}

// ── Events ───────────────────────────────────────────────────────────────────

export interface MountedDataset {
  /** Absolute path of the dataset file. */
  readonly path: string;
  readonly sizeMB: number;
}

export interface RunStats {
  readonly dataset: string | null;
  readonly artifacts: readonly string[];
  /** Share of null cells, 0..1. */
  readonly nullPercentage: number;
  readonly madeImages: boolean;
}

export type AutomationEvent =
  | { readonly type: "dataset_mounted"; readonly dataset: MountedDataset }
  | { readonly type: "run_finished"; readonly stats: RunStats }
  | { readonly type: "app_became_active" }
  | { readonly type: "error_occurred"; readonly error: AppError };

export type AutomationEventType = AutomationEvent["type"];

// ── Actions ──────────────────────────────────────────────────────────────────

export interface Playbook {
  readonly identifier: string;
  readonly dataset: string | null;
  readonly parameters: Readonly<Record<string, string>>;
  readonly description: string;
}

export interface AutomationAction {
  readonly playbook: Playbook;
  /** `<rule>::<dataset file URL | global>`, deduplicates repeated triggers. */
  readonly cacheKey: string;
}

// ── Guardrail Verdict ────────────────────────────────────────────────────────

export type GuardrailVerdict =
  | { readonly kind: "ready" }
  | { readonly kind: "rate_limited"; readonly until: Date }
  | { readonly kind: "circuit_open"; readonly until: Date }
  | { readonly kind: "manually_paused"; readonly until: Date }
  | { readonly kind: "disabled" };

// ── Engine Status ────────────────────────────────────────────────────────────
// Shared by the automation engine and the crew engine.

export type EnginePhase =
  | { readonly kind: "idle" }
  | { readonly kind: "evaluating" }
  | { readonly kind: "running"; readonly description: string }
  | { readonly kind: "paused"; readonly reason: string }
  | { readonly kind: "blocked"; readonly reason: string };

export interface EngineStatus {
  readonly phase: EnginePhase;
  readonly lastActionAt: Date | null;
}

export const IDLE: EnginePhase = { kind: "idle" };
export const EVALUATING: EnginePhase = { kind: "evaluating" };

export function running(description: string): EnginePhase {
  return { kind: "running", description };
}

export function paused(reason: string): EnginePhase {
  return { kind: "paused", reason };
}

export function blocked(reason: string): EnginePhase {
  return { kind: "blocked", reason };
}

/** Compact text form, e.g. `running(Running Quick EDA on sales.csv)`. */
export function describePhase(phase: EnginePhase): string {
  switch (phase.kind) {
    case "idle":
    case "evaluating":
      return phase.kind;
    case "running":
      return `running(${phase.description})`;
    case "paused":
    case "blocked":
      return `${phase.kind}(${phase.reason})`;
  }
}

// ── Playbook Runner ──────────────────────────────────────────────────────────

/**
 * External capability that executes playbooks. The engine does not know what
 * a playbook does. `run` must stop promptly once `signal` aborts.
 */
export interface PlaybookRunner {
  run(playbook: Playbook, signal: AbortSignal): Promise<void>;
  stopCurrentRun(): Promise<void>;
}
