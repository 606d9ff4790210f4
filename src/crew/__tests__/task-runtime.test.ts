import { describe, it, expect } from "vitest";
import { Blackboard, createArtifact, createFact } from "../blackboard.ts";
import { CrewStore } from "../crew-store.ts";
import { TaskRuntime } from "../task-runtime.ts";
import { contract, describeEvents, FakeAgentRuntime, MemoryCrewFileWriter, task } from "./helpers.ts";

describe("TaskRuntime", () => {
  it("applies facts before artifacts and returns the usage", async () => {
    const runtime = new FakeAgentRuntime().onAny(async () => ({
      newFacts: [createFact({ key: "schema", type: "schema", value: "s" })],
      artifacts: [createArtifact("table.json", "table_json", "table.json")],
      messages: ["done"],
      toolCalls: 2,
      tokens: 300,
    }));
    const bb = new Blackboard();
    const events = bb.events();

    const outcome = await new TaskRuntime(runtime).execute(task("schemaInfer"), contract(), bb);

    expect(outcome).toEqual({ toolCalls: 2, tokens: 300 });
    expect(describeEvents(events)).toEqual(["fact:schema", "artifact:table.json"]);
  });

  it("records the task in the run store", async () => {
    const writer = new MemoryCrewFileWriter();
    const store = new CrewStore("/work", { runId: "run-1", writer });
    const planTask = task("plan", { id: "task-1", ownerRole: "Planner" });

    await new TaskRuntime(new FakeAgentRuntime(), store).execute(planTask, contract(), new Blackboard());
    await store.flush();

    const [line] = writer.lines("/work/crew-runs/run-1/events.jsonl");
    expect(line).toMatchObject({
      event: "task",
      task: { id: "task-1", kind: "plan", ownerRole: "Planner" },
      messages: ["Planner drafted plan.md"],
      outcome: { toolCalls: 1, tokens: 256 },
    });
    expect(writer.written.has("/work/crew-runs/run-1/artifacts/plan.md")).toBe(true);
  });

  it("passes agent errors through unchanged", async () => {
    const failure = new Error("agent offline");
    const runtime = new FakeAgentRuntime().onAny(async () => {
      throw failure;
    });
    const bb = new Blackboard();
    await expect(new TaskRuntime(runtime).execute(task("plan"), contract(), bb)).rejects.toBe(
      failure,
    );
    expect(bb.facts()).toEqual([]);
  });
});
