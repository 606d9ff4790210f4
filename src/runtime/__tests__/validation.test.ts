import { describe, it, expect } from "vitest";
import { FieldReader, isOneOf, isRecord } from "../validation.ts";

describe("isRecord / isOneOf", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });

  it("narrows to a member of the list", () => {
    const kinds = ["off", "balanced"] as const;
    expect(isOneOf(kinds, "balanced")).toBe(true);
    expect(isOneOf(kinds, "aggressive")).toBe(false);
    expect(isOneOf(kinds, 1)).toBe(false);
  });
});

describe("FieldReader", () => {
  it("reports a non-object at its path", () => {
    const errors: string[] = [];
    expect(FieldReader.of([1], "contract", errors)).toBeUndefined();
    expect(errors).toEqual(['"contract" must be an object']);
  });

  it("reads well-typed fields without errors", () => {
    const errors: string[] = [];
    const fields = FieldReader.of(
      { goal: "g", count: 3, flag: true, tags: ["a", "b"], mode: "json" },
      "input",
      errors,
    );
    expect(fields?.string("goal")).toBe("g");
    expect(fields?.number("count", { min: 0, integer: true })).toBe(3);
    expect(fields?.boolean("flag")).toBe(true);
    expect(fields?.stringArray("tags")).toEqual(["a", "b"]);
    expect(fields?.oneOf("mode", ["json", "yaml"] as const)).toBe("json");
    expect(errors).toEqual([]);
  });

  it("collects every problem with dotted paths", () => {
    const errors: string[] = [];
    const fields = FieldReader.of(
      { goal: "", count: 1.5, low: -1, high: 2, flag: "yes", tags: ["a", 2], mode: "xml" },
      "input",
      errors,
    );
    fields?.string("goal");
    fields?.number("count", { integer: true });
    fields?.number("low", { min: 0 });
    fields?.number("high", { max: 1 });
    fields?.boolean("flag");
    fields?.stringArray("tags");
    fields?.oneOf("mode", ["json", "yaml"] as const);
    fields?.array("missing");
    expect(errors).toEqual([
      '"input.goal" must be a non-empty string',
      '"input.count" must be an integer',
      '"input.low" must be >= 0',
      '"input.high" must be <= 1',
      '"input.flag" must be a boolean',
      '"input.tags[1]" must be a string',
      '"input.mode" must be one of: json, yaml',
      '"input.missing" must be an array',
    ]);
  });

  it("treats null as absent", () => {
    const errors: string[] = [];
    const fields = FieldReader.of({ note: null }, "x", errors);
    expect(fields?.has("note")).toBe(false);
    expect(fields?.optionalString("note")).toBeUndefined();
    expect(errors).toEqual([]);
  });
});
