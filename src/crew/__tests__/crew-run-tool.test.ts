import { describe, it, expect } from "vitest";
import { createFact } from "../blackboard.ts";
import { ScriptedAgentRuntime } from "../agent-runtime.ts";
import { ContractError } from "../contract.ts";
import { CrewRunTool, parseCrewRunInput, ToolInputError } from "../crew-run-tool.ts";
import type { CrewRunOutput } from "../crew-run-tool.ts";
import { FakeAgentRuntime } from "./helpers.ts";

function parseOutput(text: string): CrewRunOutput {
  const value: CrewRunOutput = JSON.parse(text);
  return value;
}

describe("parseCrewRunInput", () => {
  it("defaults dataset ids and contract", () => {
    expect(parseCrewRunInput('{"goal":"Summarize sales"}')).toEqual({
      goal: "Summarize sales",
      datasetIds: [],
      contract: null,
    });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseCrewRunInput("goal=x")).toThrow(ToolInputError);
  });

  it("names every bad field", () => {
    expect(() => parseCrewRunInput('{"dataset_ids":[1]}')).toThrow(
      'Invalid arguments for crew.run: "args.goal" must be a non-empty string; "args.dataset_ids[0]" must be a string',
    );
  });

  it("validates an inline contract", () => {
    expect(() => parseCrewRunInput('{"goal":"g","contract":{"goal":"g"}}')).toThrow(ContractError);
  });
});

describe("CrewRunTool", () => {
  it("describes itself for a chat model", () => {
    const tool = new CrewRunTool({ agentRuntime: new FakeAgentRuntime() });
    expect(tool.name).toBe("crew.run");
    expect(tool.inputSchema.required).toEqual(["goal"]);
  });

  it("runs a crew and reports its facts and artifacts", async () => {
    const tool = new CrewRunTool({ agentRuntime: new FakeAgentRuntime() });
    const output = parseOutput(
      await tool.call('{"goal":"Summarize sales","dataset_ids":["/data/sales.csv"]}'),
    );

    expect(output.status).toBe("completed");
    expect(output.run_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(output.facts).toEqual([
      'goal:"Summarize sales"',
      'dataset_list:["sales.csv"]',
      "plan:# Plan\n- Understand Summarize sales\n- Explore datasets\n- Produce report",
      "schema:Detected schema with inferred numeric + categorical columns for sales.csv",
      "critique:No blocking issues",
      "done:## Report\nAll deliverables produced.",
    ]);
    expect(output.artifacts).toEqual(["plan.md", "plot.png", "report.md"]);
  });

  it("marks fact values that are not text", async () => {
    const scripted = new ScriptedAgentRuntime();
    const runtime = new FakeAgentRuntime().on("critique", async (task, context) => {
      const result = await scripted.run(task, context);
      const raw = createFact({ key: "raw", type: "metric", value: new Uint8Array([0xff, 0xfe]) });
      return { ...result, newFacts: [...result.newFacts, raw] };
    });
    const tool = new CrewRunTool({ agentRuntime: runtime });
    const output = parseOutput(await tool.call('{"goal":"Summarize sales"}'));
    expect(output.facts).toContain("raw:<binary>");
  });

  it("uses the configured budgets for the default contract", async () => {
    const tool = new CrewRunTool({
      agentRuntime: new FakeAgentRuntime(),
      budgets: { wallClockSec: 60, maxToolCalls: 2, maxTokensTotal: 10_000 },
    });
    const output = parseOutput(await tool.call('{"goal":"Summarize sales"}'));
    expect(output.status).toBe("budget_exhausted");
  });
});
