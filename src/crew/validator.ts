import { readFile } from "node:fs/promises";
import type { Blackboard } from "./blackboard.ts";
import { decodeFactValue } from "./blackboard.ts";
import type { QualityGate } from "./types.ts";

// ── Artifact Reader (DI for testability) ─────────────────────────────────────

export interface ArtifactReader {
  readText(path: string): Promise<string>;
}

export const NODE_ARTIFACT_READER: ArtifactReader = {
  readText: (path) => readFile(path, "utf-8"),
};

// ── Validator ────────────────────────────────────────────────────────────────

/**
 * Checks quality gates against a blackboard. An empty failure list is the
 * only state in which a crew may synthesize its final report.
 */
export class Validator {
  constructor(private readonly reader: ArtifactReader = NODE_ARTIFACT_READER) {}

  async failures(gates: readonly QualityGate[], blackboard: Blackboard): Promise<string[]> {
    const failures: string[] = [];
    for (const gate of gates) {
      const failure = await this.check(gate, blackboard);
      if (failure) failures.push(`Gate ${gate.name} failed: ${failure}`);
    }
    return failures;
  }

  private async check(gate: QualityGate, blackboard: Blackboard): Promise<string | null> {
    const { rule } = gate;
    switch (rule.kind) {
      case "minImages": {
        const images = blackboard.artifacts((a) => a.type === "image_png").length;
        return images < rule.count ? `requires >= ${rule.count} images` : null;
      }

      case "tableHasCols": {
        const artifact = blackboard.latestArtifact(rule.table);
        if (!artifact) return `missing table ${rule.table}`;
        const columns = await this.readColumns(artifact.path);
        if (!columns) return `unreadable table artifact ${rule.table}`;
        const missing = rule.cols.filter((col) => !columns.has(col));
        return missing.length > 0 ? `missing columns ${missing.join(", ")}` : null;
      }

      case "maxNullPct": {
        const fact = blackboard.fact(`metric:${rule.column}`);
        const ratio = fact ? decodeFactValue(fact.value) : undefined;
        if (typeof ratio !== "number") return `missing metric for ${rule.column}`;
        return ratio > rule.pct ? `null ratio ${ratio} > ${rule.pct}` : null;
      }
    }
  }

  /** Column names of the first record, or null when the table is not a record list. */
  private async readColumns(path: string): Promise<Set<string> | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await this.reader.readText(path));
    } catch {
      return null;
    }
    if (!Array.isArray(parsed)) return null;
    const first: unknown = parsed[0];
    if (first === undefined) return new Set();
    if (typeof first !== "object" || first === null || Array.isArray(first)) return null;
    return new Set(Object.keys(first));
  }
}
