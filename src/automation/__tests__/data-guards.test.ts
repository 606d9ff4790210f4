import { describe, it, expect } from "vitest";
import { EventBus } from "../../events/event-bus.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { AppError } from "../../types/errors.ts";
import {
  computeGuardMetrics,
  DataGuardEngine,
  formatGuardReport,
} from "../data-guards.ts";
import type { AutomationEvent } from "../types.ts";
import { MemoryDataGuardFileSystem } from "./helpers.ts";

const SPARSE_CSV = "col1,col2\n1,\n,2\n,\n,5\n6,7\n";
const DATASET = "/work/datasets/sales.csv";

describe("computeGuardMetrics", () => {
  it("counts empty cells as nulls", () => {
    expect(computeGuardMetrics(SPARSE_CSV)).toEqual({
      nullPercentage: 0.5,
      duplicateRatio: 0,
      constantColumns: [],
    });
  });

  it("finds repeated rows and single-valued columns", () => {
    const metrics = computeGuardMetrics("a,b,c\n1,x,k\n1,x,k\n2,,k\n");
    expect(metrics.nullPercentage).toBeCloseTo(1 / 9);
    expect(metrics.duplicateRatio).toBeCloseTo(1 / 3);
    expect(metrics.constantColumns).toEqual(["c"]);
  });

  it("pads short rows, truncates long ones and reads NA and null as missing", () => {
    expect(computeGuardMetrics("id, name ,flag\n1, NA\n2,Null,y,extra\n")).toEqual({
      nullPercentage: 0.5,
      duplicateRatio: 0,
      constantColumns: [],
    });
  });

  it("samples only the first rows", () => {
    expect(computeGuardMetrics("a\n1\n1\n2\n", 2)).toEqual({
      nullPercentage: 0,
      duplicateRatio: 0.5,
      constantColumns: ["a"],
    });
  });

  it("skips blank lines and accepts CRLF endings", () => {
    expect(computeGuardMetrics("a,b\r\n\r\n1,2\r\n")).toEqual({
      nullPercentage: 0,
      duplicateRatio: 0,
      constantColumns: ["a", "b"],
    });
  });

  it("returns zeros for an empty file", () => {
    expect(computeGuardMetrics("")).toEqual({
      nullPercentage: 0,
      duplicateRatio: 0,
      constantColumns: [],
    });
  });
});

describe("formatGuardReport", () => {
  it("rounds ratios to two places", () => {
    expect(
      formatGuardReport({ nullPercentage: 1 / 9, duplicateRatio: 1 / 3, constantColumns: ["c", "d"] }),
    ).toBe(
      "# Data Guard Report\n- Null percentage: 0.11\n- Duplicate ratio: 0.33\n- Constant columns: c, d\n",
    );
  });

  it("writes None without constant columns", () => {
    expect(formatGuardReport({ nullPercentage: 0.5, duplicateRatio: 0, constantColumns: [] })).toBe(
      "# Data Guard Report\n- Null percentage: 0.5\n- Duplicate ratio: 0\n- Constant columns: None\n",
    );
  });
});

describe("DataGuardEngine", () => {
  function setup() {
    const bus = new EventBus<AutomationEvent>();
    const events = bus.subscribe();
    const fs = new MemoryDataGuardFileSystem();
    const logger = BufferLogger.create();
    const guards = new DataGuardEngine({ bus, datasetsDir: "/work/datasets", fs, logger });
    return { guards, events, fs, logger };
  }

  it("writes the report beside the dataset and publishes the finished run", async () => {
    const { guards, events, fs } = setup();
    fs.files.set(DATASET, SPARSE_CSV);

    const metrics = await guards.run(DATASET, true);

    expect(metrics.nullPercentage).toBe(0.5);
    expect(fs.dirs).toEqual(["/work/datasets"]);
    expect(fs.files.get("/work/datasets/GuardReport.md")).toBe(
      "# Data Guard Report\n- Null percentage: 0.5\n- Duplicate ratio: 0\n- Constant columns: None\n",
    );
    expect(events.drain()).toEqual([
      {
        type: "run_finished",
        stats: {
          dataset: DATASET,
          artifacts: ["GuardReport.md"],
          nullPercentage: 0.5,
          madeImages: true,
        },
      },
    ]);
  });

  it("resolves the first dataset id under the datasets directory", async () => {
    const { guards, events, fs } = setup();
    fs.files.set(DATASET, "a,b\n1,2\n");

    const metrics = await guards.process(["sales.csv", "other.csv"], false);

    expect(metrics).toEqual({ nullPercentage: 0, duplicateRatio: 0, constantColumns: ["a", "b"] });
    expect(events.drain().map((e) => e.type)).toEqual(["run_finished"]);
  });

  it("does nothing without datasets", async () => {
    const { guards, events } = setup();
    expect(await guards.process([], false)).toBeNull();
    expect(events.drain()).toEqual([]);
  });

  it("publishes a failure instead of throwing", async () => {
    const { guards, events, fs, logger } = setup();

    expect(await guards.process(["missing.csv"], false)).toBeNull();

    const [event, ...rest] = events.drain();
    expect(rest).toEqual([]);
    if (event?.type !== "error_occurred") throw new Error("expected an error event");
    expect(event.error).toBeInstanceOf(AppError);
    expect(event.error.code).toBe("autoflow");
    expect(event.error.message).toBe("ENOENT: /work/datasets/missing.csv");
    expect(fs.files.size).toBe(0);
    expect(logger.has("warn", "data_guard_failed")).toBe(true);
  });
});
