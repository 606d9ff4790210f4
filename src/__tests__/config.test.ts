import { describe, expect, it } from "vitest";
import { ConfigError } from "../config.ts";
import { DEFAULT_AGENT_MODEL } from "../agents/claude-client.ts";
import { testConfig } from "./helpers.ts";

function configError(env: Record<string, string | undefined>): ConfigError | undefined {
  try {
    testConfig(env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  return undefined;
}

describe("loadConfig", () => {
  // ── Defaults ───────────────────────────────────────────────────────────

  it("runs without an API key", () => {
    const config = testConfig();
    expect(config.anthropicApiKey).toBeUndefined();
    expect(config.agentModel).toBe(DEFAULT_AGENT_MODEL);
  });

  it("derives the automation directory from the workspace", () => {
    expect(testConfig().workspace).toEqual({
      rootDir: "/work",
      autoflowDir: "/work/autoflow",
      datasetsDir: "/work/datasets",
    });
  });

  it("defaults automation and crew limits", () => {
    const config = testConfig();
    expect(config.automation).toEqual({ nullThreshold: 0.3, runnerTimeoutMs: 120_000 });
    expect(config.crew).toEqual({ wallClockSec: 120, maxToolCalls: 12, maxTokensTotal: 20_000 });
  });

  it("returns a frozen config", () => {
    const config = testConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.crew)).toBe(true);
  });

  // ── Overrides ──────────────────────────────────────────────────────────

  it("reads every variable", () => {
    const config = testConfig({
      ANTHROPIC_API_KEY: " test-secret ",
      AGENT_MODEL: "test-model",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "pretty",
      AUTOFLOW_NULL_THRESHOLD: "0.5",
      AUTOFLOW_RUNNER_TIMEOUT_MS: "30000",
      CREW_WALL_CLOCK_SEC: "60",
      CREW_MAX_TOOL_CALLS: "4",
      CREW_MAX_TOKENS: "8000",
    });
    expect(config.anthropicApiKey).toBe("test-secret");
    expect(config.agentModel).toBe("test-model");
    expect(config.logging).toEqual({ level: "debug", format: "pretty" });
    expect(config.automation).toEqual({ nullThreshold: 0.5, runnerTimeoutMs: 30_000 });
    expect(config.crew).toEqual({ wallClockSec: 60, maxToolCalls: 4, maxTokensTotal: 8_000 });
  });

  it("treats a blank API key as absent", () => {
    expect(testConfig({ ANTHROPIC_API_KEY: "   " }).anthropicApiKey).toBeUndefined();
  });

  // ── Validation ─────────────────────────────────────────────────────────

  it("rejects an unknown log level", () => {
    const err = configError({ LOG_LEVEL: "verbose" });
    expect(err?.field).toBe("LOG_LEVEL");
    expect(err?.message).toBe(
      'LOG_LEVEL must be one of: trace, debug, info, warn, error, fatal, silent. Got "verbose".',
    );
  });

  it("rejects an unknown log format", () => {
    expect(configError({ LOG_FORMAT: "xml" })?.field).toBe("LOG_FORMAT");
  });

  it("rejects a null threshold outside 0..1", () => {
    expect(configError({ AUTOFLOW_NULL_THRESHOLD: "1.5" })?.message).toBe(
      'AUTOFLOW_NULL_THRESHOLD must be a number between 0 and 1, got "1.5".',
    );
  });

  it("rejects fractional and non-positive limits", () => {
    expect(configError({ CREW_MAX_TOOL_CALLS: "2.5" })?.field).toBe("CREW_MAX_TOOL_CALLS");
    expect(configError({ CREW_WALL_CLOCK_SEC: "0" })?.field).toBe("CREW_WALL_CLOCK_SEC");
    expect(configError({ AUTOFLOW_RUNNER_TIMEOUT_MS: "soon" })?.field).toBe(
      "AUTOFLOW_RUNNER_TIMEOUT_MS",
    );
  });
});
