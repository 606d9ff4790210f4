import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { FieldReader } from "../runtime/validation.ts";
import { errorMessage } from "../types/errors.ts";
import type { Budgets, Deliverable, PlanContract, QualityGate, QualityRule } from "./types.ts";

// ── Error ───────────────────────────────────────────────────────────────────

export class ContractError extends Error {
  override readonly name = "ContractError";

  constructor(readonly errors: readonly string[]) {
    super(`Invalid plan contract: ${errors.join("; ")}`);
  }
}

// ── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_ALLOWED_TOOLS = ["python.execute", "retriever.search", "notebook.write"] as const;

export const DEFAULT_BUDGETS: Budgets = {
  wallClockSec: 120,
  maxToolCalls: 12,
  maxTokensTotal: 20_000,
};

export const COMPAT_BUDGETS: Budgets = {
  wallClockSec: 300,
  maxToolCalls: 20,
  maxTokensTotal: 50_000,
};

/** Plan and report deliverables, and at least one chart. */
export function defaultContract(goal: string, budgets: Budgets = DEFAULT_BUDGETS): PlanContract {
  return {
    goal,
    allowedTools: [...DEFAULT_ALLOWED_TOOLS],
    requiredDeliverables: [
      { name: "plan.md", type: "markdown" },
      { name: "report.md", type: "markdown" },
    ],
    budgets,
    qualityGates: [{ name: "image", rule: { kind: "minImages", count: 1 } }],
  };
}

// ── Crew Description ────────────────────────────────────────────────────────

export interface CrewDescription {
  readonly goal: string;
  readonly roles: readonly string[];
  readonly tasks: readonly string[];
}

/** Contract for a role/task crew description: one deliverable per task, no gates. */
export function contractFromCrewDescription(description: CrewDescription): PlanContract {
  return {
    goal: description.goal,
    allowedTools: [...DEFAULT_ALLOWED_TOOLS],
    requiredDeliverables: description.tasks.map((task, index) => ({
      name: `compat_task_${index}`,
      type: task,
    })),
    budgets: COMPAT_BUDGETS,
    qualityGates: [],
  };
}

export function parseCrewDescription(value: unknown): CrewDescription {
  const errors: string[] = [];
  const fields = FieldReader.of(value, "crew", errors);
  const goal = fields?.string("goal");
  const roles = fields?.stringArray("roles");
  const tasks = fields?.stringArray("tasks");
  if (errors.length > 0 || goal === undefined || !roles || !tasks) {
    throw new ContractError(errors);
  }
  return { goal, roles, tasks };
}

// ── Parsing ─────────────────────────────────────────────────────────────────

/** Validate an untrusted value. Every problem found is listed on the error. */
export function parseContract(value: unknown): PlanContract {
  const errors: string[] = [];
  const fields = FieldReader.of(value, "contract", errors);
  if (!fields) throw new ContractError(errors);

  const goal = fields.string("goal");
  const allowedTools = fields.stringArray("allowedTools");
  const deliverables = fields.array("requiredDeliverables");
  const requiredDeliverables = deliverables?.map((item, i) =>
    parseDeliverable(item, `${fields.at("requiredDeliverables")}[${i}]`, errors),
  );
  const budgets = parseBudgets(fields.raw("budgets"), fields.at("budgets"), errors);
  const gates = fields.has("qualityGates") ? fields.array("qualityGates") : [];
  const qualityGates = gates?.map((item, i) =>
    parseGate(item, `${fields.at("qualityGates")}[${i}]`, errors),
  );

  if (
    errors.length > 0 ||
    goal === undefined ||
    !allowedTools ||
    !requiredDeliverables ||
    !budgets ||
    !qualityGates
  ) {
    throw new ContractError(errors);
  }

  return {
    goal,
    allowedTools,
    requiredDeliverables: requiredDeliverables.filter(isPresent),
    budgets,
    qualityGates: qualityGates.filter(isPresent),
  };
}

function parseDeliverable(value: unknown, path: string, errors: string[]): Deliverable | undefined {
  const fields = FieldReader.of(value, path, errors);
  const name = fields?.string("name");
  const type = fields?.string("type");
  return name !== undefined && type !== undefined ? { name, type } : undefined;
}

function parseBudgets(value: unknown, path: string, errors: string[]): Budgets | undefined {
  const fields = FieldReader.of(value, path, errors);
  if (!fields) return undefined;
  const wallClockSec = fields.number("wallClockSec", { min: 1 });
  const maxToolCalls = fields.number("maxToolCalls", { min: 0, integer: true });
  const maxTokensTotal = fields.number("maxTokensTotal", { min: 0, integer: true });
  if (wallClockSec === undefined || maxToolCalls === undefined || maxTokensTotal === undefined) {
    return undefined;
  }
  return { wallClockSec, maxToolCalls, maxTokensTotal };
}

const RULE_KINDS = ["minImages", "tableHasCols", "maxNullPct"] as const;

function parseGate(value: unknown, path: string, errors: string[]): QualityGate | undefined {
  const fields = FieldReader.of(value, path, errors);
  if (!fields) return undefined;
  const name = fields.string("name");
  const rule = parseRule(fields.raw("rule"), fields.at("rule"), errors);
  return name !== undefined && rule ? { name, rule } : undefined;
}

function parseRule(value: unknown, path: string, errors: string[]): QualityRule | undefined {
  const fields = FieldReader.of(value, path, errors);
  const kind = fields?.oneOf("kind", RULE_KINDS);
  if (!fields || !kind) return undefined;

  switch (kind) {
    case "minImages": {
      // `intValue` is the older spelling of `count`.
      const countField = fields.has("count") || !fields.has("intValue") ? "count" : "intValue";
      const count = fields.number(countField, { min: 0, integer: true });
      return count !== undefined ? { kind, count } : undefined;
    }
    case "tableHasCols": {
      const table = fields.string("table");
      const cols = fields.stringArray("cols");
      return table !== undefined && cols ? { kind, table, cols } : undefined;
    }
    case "maxNullPct": {
      const column = fields.string("column");
      const pct = fields.number("pct", { min: 0, max: 1 });
      return column !== undefined && pct !== undefined ? { kind, column, pct } : undefined;
    }
  }
}

function isPresent<T>(value: T | undefined): value is T {
  return value !== undefined;
}

// ── Loading ─────────────────────────────────────────────────────────────────

export type TextFileReader = (path: string) => Promise<string>;

const readText: TextFileReader = (path) => readFile(path, "utf-8");

/** Parse contract text. `.yaml`/`.yml` sources are YAML, everything else JSON. */
export function parseContractText(text: string, sourcePath = "contract.json"): PlanContract {
  const ext = extname(sourcePath).toLowerCase();
  let value: unknown;
  try {
    value = ext === ".yaml" || ext === ".yml" ? parseYaml(text) : JSON.parse(text);
  } catch (err: unknown) {
    throw new ContractError([`${sourcePath}: ${errorMessage(err)}`]);
  }
  return parseContract(value);
}

export async function loadContract(
  path: string,
  reader: TextFileReader = readText,
): Promise<PlanContract> {
  let text: string;
  try {
    text = await reader(path);
  } catch (err: unknown) {
    throw new ContractError([`${path}: ${errorMessage(err)}`]);
  }
  return parseContractText(text, path);
}
