import { join, resolve } from "node:path";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";
import { isOneOf } from "./runtime/validation.ts";
import { DEFAULT_AGENT_MODEL } from "./agents/claude-client.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  /** Absent means the scripted agent runtime is used. */
  readonly anthropicApiKey: string | undefined;
  readonly agentModel: string;
  readonly workspace: {
    readonly rootDir: string;
    readonly autoflowDir: string;
    /** Relative dataset ids resolve here. */
    readonly datasetsDir: string;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly automation: {
    readonly nullThreshold: number;
    readonly runnerTimeoutMs: number;
  };
  readonly crew: {
    readonly wallClockSec: number;
    readonly maxToolCalls: number;
    readonly maxTokensTotal: number;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Env-var-style overrides for tests, keyed by variable name.
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError naming the first invalid variable.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env = (key: string): string | undefined =>
    envOverrides && key in envOverrides ? envOverrides[key] : process.env[key];

  // ── Agent ──────────────────────────────────────────────────────────────
  const anthropicApiKey = env("ANTHROPIC_API_KEY")?.trim() || undefined;
  const agentModel = env("AGENT_MODEL")?.trim() || DEFAULT_AGENT_MODEL;

  // ── Workspace ──────────────────────────────────────────────────────────
  const workspaceDir = env("WORKSPACE_DIR")?.trim() || "./workspace";
  const rootDir = resolve(process.cwd(), workspaceDir);

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevelRaw = (env("LOG_LEVEL") || "info").trim();
  if (!isOneOf(LOG_LEVELS, logLevelRaw)) {
    throw new ConfigError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}. Got "${logLevelRaw}".`,
      "LOG_LEVEL",
    );
  }

  const logFormatRaw = (env("LOG_FORMAT") || "pretty").trim();
  if (!isOneOf(LOG_FORMATS, logFormatRaw)) {
    throw new ConfigError(
      `LOG_FORMAT must be one of: ${LOG_FORMATS.join(", ")}. Got "${logFormatRaw}".`,
      "LOG_FORMAT",
    );
  }

  // ── Automation ─────────────────────────────────────────────────────────
  const nullThreshold = readNumber(env, "AUTOFLOW_NULL_THRESHOLD", 0.3, {
    min: 0,
    max: 1,
    description: "a number between 0 and 1",
  });
  const runnerTimeoutMs = readNumber(env, "AUTOFLOW_RUNNER_TIMEOUT_MS", 120_000, {
    min: 1,
    integer: true,
    description: "a positive integer",
  });

  // ── Crew Budgets ───────────────────────────────────────────────────────
  const wallClockSec = readNumber(env, "CREW_WALL_CLOCK_SEC", 120, {
    min: 1,
    integer: true,
    description: "a positive integer",
  });
  const maxToolCalls = readNumber(env, "CREW_MAX_TOOL_CALLS", 12, {
    min: 1,
    integer: true,
    description: "a positive integer",
  });
  const maxTokensTotal = readNumber(env, "CREW_MAX_TOKENS", 20_000, {
    min: 1,
    integer: true,
    description: "a positive integer",
  });

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    anthropicApiKey,
    agentModel,
    workspace: Object.freeze({
      rootDir,
      autoflowDir: join(rootDir, "autoflow"),
      datasetsDir: join(rootDir, "datasets"),
    }),
    logging: Object.freeze({ level: logLevelRaw, format: logFormatRaw }),
    automation: Object.freeze({ nullThreshold, runnerTimeoutMs }),
    crew: Object.freeze({ wallClockSec, maxToolCalls, maxTokensTotal }),
  });
}

interface NumberRule {
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
  readonly description: string;
}

function readNumber(
  env: (key: string) => string | undefined,
  key: string,
  fallback: number,
  rule: NumberRule,
): number {
  const raw = env(key)?.trim();
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  const valid =
    Number.isFinite(value) &&
    (!rule.integer || Number.isInteger(value)) &&
    (rule.min === undefined || value >= rule.min) &&
    (rule.max === undefined || value <= rule.max);
  if (!valid) {
    throw new ConfigError(`${key} must be ${rule.description}, got "${raw}".`, key);
  }
  return value;
}
