import { describe, it, expect } from "vitest";
import { Blackboard, createArtifact, createFact } from "../blackboard.ts";
import { Validator } from "../validator.ts";
import type { QualityGate } from "../types.ts";
import { MemoryArtifactReader } from "./helpers.ts";

function setup() {
  const reader = new MemoryArtifactReader();
  return { reader, validator: new Validator(reader), bb: new Blackboard() };
}

const tableGate: QualityGate = {
  name: "columns",
  rule: { kind: "tableHasCols", table: "summary.json", cols: ["region", "revenue"] },
};

describe("Validator", () => {
  it("passes with no gates", async () => {
    const { validator, bb } = setup();
    expect(await validator.failures([], bb)).toEqual([]);
  });

  it("counts image artifacts for minImages", async () => {
    const { validator, bb } = setup();
    const gate: QualityGate = { name: "charts", rule: { kind: "minImages", count: 2 } };
    bb.addArtifact(createArtifact("a.png", "image_png", "a.png"));
    expect(await validator.failures([gate], bb)).toEqual([
      "Gate charts failed: requires >= 2 images",
    ]);
    bb.addArtifact(createArtifact("b.png", "image_png", "b.png"));
    expect(await validator.failures([gate], bb)).toEqual([]);
  });

  it("reports a missing table", async () => {
    const { validator, bb } = setup();
    expect(await validator.failures([tableGate], bb)).toEqual([
      "Gate columns failed: missing table summary.json",
    ]);
  });

  it("reports missing columns from the latest table artifact", async () => {
    const { reader, validator, bb } = setup();
    reader.texts.set("/runs/1.json", JSON.stringify([{ region: "n", revenue: 1 }]));
    reader.texts.set("/runs/2.json", JSON.stringify([{ region: "n" }]));
    bb.addArtifact(createArtifact("summary.json", "table_json", "/runs/1.json"));
    expect(await validator.failures([tableGate], bb)).toEqual([]);
    bb.addArtifact(createArtifact("summary.json", "table_json", "/runs/2.json"));
    expect(await validator.failures([tableGate], bb)).toEqual([
      "Gate columns failed: missing columns revenue",
    ]);
  });

  it("treats an empty table as having no columns", async () => {
    const { reader, validator, bb } = setup();
    reader.texts.set("/runs/empty.json", "[]");
    bb.addArtifact(createArtifact("summary.json", "table_json", "/runs/empty.json"));
    expect(await validator.failures([tableGate], bb)).toEqual([
      "Gate columns failed: missing columns region, revenue",
    ]);
  });

  it("reports an unreadable table", async () => {
    const { reader, validator, bb } = setup();
    reader.texts.set("/runs/bad.json", '{"region": 1}');
    bb.addArtifact(createArtifact("summary.json", "table_json", "/runs/bad.json"));
    bb.addArtifact(createArtifact("other.json", "table_json", "/runs/gone.json"));
    const gone: QualityGate = {
      name: "other",
      rule: { kind: "tableHasCols", table: "other.json", cols: ["x"] },
    };
    expect(await validator.failures([tableGate, gone], bb)).toEqual([
      "Gate columns failed: unreadable table artifact summary.json",
      "Gate other failed: unreadable table artifact other.json",
    ]);
  });

  it("compares the null metric against maxNullPct", async () => {
    const { validator, bb } = setup();
    const gate: QualityGate = { name: "nulls", rule: { kind: "maxNullPct", column: "price", pct: 0.2 } };
    expect(await validator.failures([gate], bb)).toEqual([
      "Gate nulls failed: missing metric for price",
    ]);
    bb.upsertFact(createFact({ key: "metric:price", type: "metric", value: 0.25 }));
    expect(await validator.failures([gate], bb)).toEqual(["Gate nulls failed: null ratio 0.25 > 0.2"]);
    bb.upsertFact(createFact({ key: "metric:price", type: "metric", value: 0.2 }));
    expect(await validator.failures([gate], bb)).toEqual([]);
  });
});
