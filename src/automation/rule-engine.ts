import { basename } from "node:path";
import { pathToFileURL } from "node:url";
import type {
  AutomationAction,
  AutomationEvent,
  AutomationPreferences,
  RunStats,
} from "./types.ts";

// ── Rule Context ─────────────────────────────────────────────────────────────

export interface RuleContext {
  readonly preferences: AutomationPreferences;
  readonly now: Date;
  /** Null share at or above which a finished run is cleaned. */
  readonly nullThreshold: number;
}

export const DEFAULT_NULL_THRESHOLD = 0.3;

/** Datasets above this size are never auto-profiled. */
export const MAX_AUTO_EDA_SIZE_MB = 50;

export const RULE_NAMES = {
  quickEda: "datasetMounted",
  cleanHighNulls: "clean-high-nulls",
  missingPlots: "missing-plots",
} as const;

export function createRuleContext(
  preferences: AutomationPreferences,
  now: Date,
  nullThreshold: number = DEFAULT_NULL_THRESHOLD,
): RuleContext {
  return { preferences, now, nullThreshold };
}

// ── Rule Engine ──────────────────────────────────────────────────────────────

/**
 * Map one event to at most one candidate action. Pure: the same event and
 * context always yield the same action, and nothing is mutated.
 */
export function actionFor(
  event: AutomationEvent,
  context: RuleContext,
): AutomationAction | null {
  switch (event.type) {
    case "dataset_mounted": {
      const { preferences } = context;
      if (
        preferences.profile === "off" ||
        !preferences.toggles.quickEDAOnMount ||
        event.dataset.sizeMB > MAX_AUTO_EDA_SIZE_MB
      ) {
        return null;
      }
      return {
        playbook: {
          identifier: "eda-basic",
          dataset: event.dataset.path,
          parameters: {},
          description: `Running Quick EDA on ${basename(event.dataset.path)}`,
        },
        cacheKey: cacheKey(RULE_NAMES.quickEda, event.dataset.path),
      };
    }
    case "run_finished":
      return actionForFinishedRun(event.stats, context);
    case "app_became_active":
    case "error_occurred":
      return null;
  }
}

function actionForFinishedRun(
  stats: RunStats,
  context: RuleContext,
): AutomationAction | null {
  const { profile, toggles } = context.preferences;
  if (profile === "off") return null;

  // Cleaning wins over plotting when both would apply.
  if (
    toggles.cleanOnHighNulls &&
    stats.nullPercentage >= context.nullThreshold &&
    (profile === "balanced" || profile === "aggressive")
  ) {
    return {
      playbook: {
        identifier: "clean-profile",
        dataset: stats.dataset,
        parameters: {},
        description: "Cleaning high nulls",
      },
      cacheKey: cacheKey(RULE_NAMES.cleanHighNulls, stats.dataset),
    };
  }

  if (toggles.plotsOnMissing && profile === "aggressive" && !stats.madeImages) {
    const parameters: Record<string, string> = {};
    if (!stats.artifacts.includes("plots")) {
      parameters["mode"] = "plots";
    }
    return {
      playbook: {
        identifier: "eda-basic",
        dataset: stats.dataset,
        parameters,
        description: "Adding plots",
      },
      cacheKey: cacheKey(RULE_NAMES.missingPlots, stats.dataset),
    };
  }

  return null;
}

/** Keyed by dataset path, so a moved or renamed file is a new key. */
export function cacheKey(rule: string, datasetPath: string | null): string {
  const component = datasetPath ? pathToFileURL(datasetPath).href : "global";
  return `${rule}::${component}`;
}
