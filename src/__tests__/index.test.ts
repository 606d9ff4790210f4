import { describe, expect, it } from "vitest";
import * as api from "../../index.ts";
import { DataGuardEngine } from "../automation/data-guards.ts";
import { AutomationEngine } from "../automation/automation-engine.ts";
import { runCrew } from "../crew/run-crew.ts";
import { withTimeout } from "../runtime/cancellation.ts";
import { EventBus } from "../events/event-bus.ts";
import { createLogger } from "../observability/logger.ts";
import { AppError } from "../types/errors.ts";
import { ClaudeAgentRuntime } from "../agents/claude-agent-runtime.ts";

describe("autoflow-crew", () => {
  it("exposes every area through the package entry", () => {
    expect(api.VERSION).toBe("0.1.0");
    expect(api.DataGuardEngine).toBe(DataGuardEngine);
    expect(api.AutomationEngine).toBe(AutomationEngine);
    expect(api.runCrew).toBe(runCrew);
    expect(api.withTimeout).toBe(withTimeout);
    expect(api.EventBus).toBe(EventBus);
    expect(api.createLogger).toBe(createLogger);
    expect(api.AppError).toBe(AppError);
    expect(api.ClaudeAgentRuntime).toBe(ClaudeAgentRuntime);
  });
});
