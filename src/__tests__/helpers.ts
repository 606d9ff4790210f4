import { bootstrap } from "../bootstrap.ts";
import type { Application } from "../bootstrap.ts";
import { loadConfig } from "../config.ts";
import type { RuntimeConfig } from "../config.ts";
import { BufferLogger } from "../observability/logger.ts";
import { FakeAgentRuntime, MemoryCrewFileWriter } from "../crew/__tests__/helpers.ts";
import {
  MemoryDataGuardFileSystem,
  MemorySettingsFileSystem,
} from "../automation/__tests__/helpers.ts";

/** Config that ignores the real environment, rooted at /work. */
export function testConfig(env: Record<string, string | undefined> = {}): RuntimeConfig {
  return loadConfig({
    ANTHROPIC_API_KEY: undefined,
    AGENT_MODEL: undefined,
    WORKSPACE_DIR: "/work",
    LOG_LEVEL: "silent",
    LOG_FORMAT: "json",
    AUTOFLOW_NULL_THRESHOLD: undefined,
    AUTOFLOW_RUNNER_TIMEOUT_MS: undefined,
    CREW_WALL_CLOCK_SEC: undefined,
    CREW_MAX_TOOL_CALLS: undefined,
    CREW_MAX_TOKENS: undefined,
    ...env,
  });
}

export interface TestApplication {
  readonly app: Application;
  readonly logger: BufferLogger;
  readonly runtime: FakeAgentRuntime;
  readonly writer: MemoryCrewFileWriter;
  readonly settingsFs: MemorySettingsFileSystem;
  readonly guardFs: MemoryDataGuardFileSystem;
}

/** Fully wired application on in-memory files and the scripted agent. */
export function createTestApplication(env: Record<string, string | undefined> = {}): TestApplication {
  const logger = BufferLogger.create();
  const runtime = new FakeAgentRuntime();
  const writer = new MemoryCrewFileWriter();
  const settingsFs = new MemorySettingsFileSystem();
  const guardFs = new MemoryDataGuardFileSystem();
  const app = bootstrap(testConfig(env), {
    logger,
    agentRuntime: runtime,
    writer,
    settingsFs,
    guardFs,
    handleSignals: false,
  });
  return { app, logger, runtime, writer, settingsFs, guardFs };
}
