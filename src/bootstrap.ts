import { join } from "node:path";
import Anthropic from "@anthropic-ai/sdk";
import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { JsonLinesLog } from "./observability/run-log.ts";
import { EventBus } from "./events/event-bus.ts";
import { errorMessage } from "./types/errors.ts";
import { AnthropicClaudeClient } from "./agents/claude-client.ts";
import { ClaudeAgentRuntime } from "./agents/claude-agent-runtime.ts";
import { ScriptedAgentRuntime } from "./crew/agent-runtime.ts";
import type { AgentRuntime } from "./crew/agent-runtime.ts";
import { NODE_CREW_FILE_WRITER } from "./crew/crew-store.ts";
import type { CrewFileWriter } from "./crew/crew-store.ts";
import { CrewRunTool } from "./crew/crew-run-tool.ts";
import type { Budgets } from "./crew/types.ts";
import { AutomationEngine } from "./automation/automation-engine.ts";
import { GuardrailState } from "./automation/guardrail-state.ts";
import { AutomationOrchestrator } from "./automation/orchestrator.ts";
import { CrewPlaybookRunner } from "./automation/playbook-runners.ts";
import { DataGuardEngine } from "./automation/data-guards.ts";
import type { DataGuardFileSystem } from "./automation/data-guards.ts";
import { AutomationSettingsStore } from "./automation/settings-store.ts";
import type { SettingsFileSystem } from "./automation/settings-store.ts";
import type { AutomationEvent } from "./automation/types.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly agentRuntime: AgentRuntime;
  readonly budgets: Budgets;
  readonly writer: CrewFileWriter;
  readonly bus: EventBus<AutomationEvent>;
  readonly engine: AutomationEngine;
  readonly orchestrator: AutomationOrchestrator;
  readonly settings: AutomationSettingsStore;
  readonly guards: DataGuardEngine;
  readonly crewTool: CrewRunTool;

  start(): Promise<void>;
  shutdown(): Promise<void>;
}

/** Replacements for the real collaborators, used by tests and dry runs. */
export interface BootstrapOverrides {
  readonly logger?: Logger;
  readonly agentRuntime?: AgentRuntime;
  readonly writer?: CrewFileWriter;
  readonly settingsFs?: SettingsFileSystem;
  readonly guardFs?: DataGuardFileSystem;
  readonly clock?: () => Date;
  /** Install SIGTERM/SIGINT handlers that shut the app down. Default true. */
  readonly handleSignals?: boolean;
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire all modules together with real implementations.
 * This is the composition root, the single place where dependencies are chosen.
 *
 * Without an Anthropic API key the crew runs on the scripted agent runtime.
 */
export function bootstrap(
  config: RuntimeConfig,
  overrides: BootstrapOverrides = {},
): Application {
  // 1. Logger
  const logger =
    overrides.logger ??
    createLogger({ level: config.logging.level, format: config.logging.format });
  const writer = overrides.writer ?? NODE_CREW_FILE_WRITER;
  const clock = overrides.clock;

  // 2. Agent runtime
  const agentRuntime = overrides.agentRuntime ?? createAgentRuntime(config, logger);

  // 3. Crew budgets
  const budgets: Budgets = {
    wallClockSec: config.crew.wallClockSec,
    maxToolCalls: config.crew.maxToolCalls,
    maxTokensTotal: config.crew.maxTokensTotal,
  };

  // 4. Automation
  const bus = new EventBus<AutomationEvent>();
  const runLog = new JsonLinesLog(join(config.workspace.autoflowDir, "elog.jsonl"), {
    writer,
    logger,
    now: clock,
  });
  const runner = new CrewPlaybookRunner({
    agentRuntime,
    workspaceDir: config.workspace.rootDir,
    budgets,
    writer,
    logger,
  });
  const engine = new AutomationEngine({
    bus,
    runner,
    state: new GuardrailState(),
    runLog,
    logger,
    clock,
    config: {
      nullThreshold: config.automation.nullThreshold,
      runnerTimeoutMs: config.automation.runnerTimeoutMs,
    },
  });
  const orchestrator = new AutomationOrchestrator(bus, engine);
  const settings = new AutomationSettingsStore(
    join(config.workspace.autoflowDir, "settings.yaml"),
    engine,
    { fs: overrides.settingsFs, logger },
  );
  const guards = new DataGuardEngine({
    bus,
    datasetsDir: config.workspace.datasetsDir,
    fs: overrides.guardFs,
    logger,
  });

  // 5. Tools
  const crewTool = new CrewRunTool({
    agentRuntime,
    workspaceDir: config.workspace.rootDir,
    budgets,
    writer,
    logger,
  });

  let shuttingDown = false;

  const app: Application = {
    config,
    logger,
    agentRuntime,
    budgets,
    writer,
    bus,
    engine,
    orchestrator,
    settings,
    guards,
    crewTool,

    async start(): Promise<void> {
      logger.info("app_starting", { workspace: config.workspace.rootDir });
      await settings.load();
      engine.start();
    },

    async shutdown(): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info("app_shutting_down");

      // 1. Cancel any run in flight, then drain the engine
      try {
        if (engine.isRunning) {
          await engine.stop();
        }
        await engine.close();
      } catch (err: unknown) {
        logger.error("automation_engine_close_failed", { error: errorMessage(err) });
      }

      // 2. Flush the automation log
      await runLog.flush();

      // 3. Remove signal handlers to prevent accumulation
      if (signalHandlers) {
        process.removeListener("SIGTERM", signalHandlers.sigterm);
        process.removeListener("SIGINT", signalHandlers.sigint);
      }

      logger.info("app_shutdown_complete");
    },
  };

  // 6. Signal handlers for graceful shutdown (with dedup guard)
  let signalHandled = false;
  const onSignal = async (signal: string): Promise<void> => {
    if (signalHandled) return;
    signalHandled = true;
    logger.info("signal_received", { signal });
    await app.shutdown();
    process.exit(0);
  };

  const signalHandlers =
    overrides.handleSignals === false
      ? null
      : {
          sigterm: () => void onSignal("SIGTERM"),
          sigint: () => void onSignal("SIGINT"),
        };
  if (signalHandlers) {
    process.on("SIGTERM", signalHandlers.sigterm);
    process.on("SIGINT", signalHandlers.sigint);
  }

  return app;
}

function createAgentRuntime(config: RuntimeConfig, logger: Logger): AgentRuntime {
  if (!config.anthropicApiKey) {
    logger.info("agent_runtime_selected", { runtime: "scripted" });
    return new ScriptedAgentRuntime();
  }
  logger.info("agent_runtime_selected", { runtime: "claude", model: config.agentModel });
  const client = new AnthropicClaudeClient(
    new Anthropic({ apiKey: config.anthropicApiKey }),
    logger,
  );
  return new ClaudeAgentRuntime(client, { config: { model: config.agentModel }, logger });
}
