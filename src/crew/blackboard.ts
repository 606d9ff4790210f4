import { randomUUID } from "node:crypto";
import { EventBus } from "../events/event-bus.ts";
import type { Subscription } from "../events/event-bus.ts";
import type { Artifact, ArtifactType, BlackboardEvent, Fact, FactType } from "./types.ts";

// ── Value Encoding ───────────────────────────────────────────────────────────

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeFactValue(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

/** Parsed JSON value, or undefined when the bytes are not JSON. */
export function decodeFactValue(value: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(value));
  } catch {
    return undefined;
  }
}

export function factText(fact: Fact): string {
  return decoder.decode(fact.value);
}

// ── Factories ────────────────────────────────────────────────────────────────

export interface FactInit {
  readonly key: string;
  readonly type: FactType;
  /** Bytes are stored as is, strings as UTF-8 text, anything else as JSON. */
  readonly value: unknown;
  readonly ttlSeconds?: number;
  readonly createdAt?: Date;
}

export function createFact(init: FactInit): Fact {
  const value =
    init.value instanceof Uint8Array
      ? init.value
      : typeof init.value === "string"
        ? encoder.encode(init.value)
        : encodeFactValue(init.value);
  return {
    id: randomUUID(),
    key: init.key,
    type: init.type,
    value,
    createdAt: (init.createdAt ?? new Date()).toISOString(),
    ...(init.ttlSeconds !== undefined ? { ttlSeconds: init.ttlSeconds } : {}),
  };
}

export function createArtifact(
  name: string,
  type: ArtifactType,
  path: string,
  meta: Record<string, string> = {},
): Artifact {
  return { id: randomUUID(), name, type, path, meta };
}

// ── Blackboard ───────────────────────────────────────────────────────────────

export interface BlackboardOptions {
  readonly clock?: () => Date;
}

/**
 * Shared fact and artifact store for one crew run. Every mutation is
 * synchronous and publishes exactly one event, so each subscriber sees
 * mutations in the order they were applied. Queries return copies.
 */
export class Blackboard {
  private readonly factsByKey = new Map<string, Fact>();
  private readonly artifactList: Artifact[] = [];
  private readonly bus = new EventBus<BlackboardEvent>();
  private readonly clock: () => Date;

  constructor(options: BlackboardOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  upsertFact(fact: Fact): void {
    // Delete first so a replaced key moves to the end of iteration order.
    this.factsByKey.delete(fact.key);
    this.factsByKey.set(fact.key, fact);
    this.bus.publish({ type: "fact_upserted", key: fact.key });
  }

  /** Append-only; artifacts with the same name are all kept. */
  addArtifact(artifact: Artifact): void {
    this.artifactList.push(artifact);
    this.bus.publish({ type: "artifact_added", name: artifact.name });
  }

  facts(predicate: (fact: Fact) => boolean = () => true): Fact[] {
    const now = this.clock().getTime();
    return [...this.factsByKey.values()].filter(
      (fact) => !isExpired(fact, now) && predicate(fact),
    );
  }

  fact(key: string): Fact | undefined {
    const fact = this.factsByKey.get(key);
    if (!fact || isExpired(fact, this.clock().getTime())) return undefined;
    return fact;
  }

  hasFact(predicate: (fact: Fact) => boolean): boolean {
    return this.facts(predicate).length > 0;
  }

  artifacts(predicate: (artifact: Artifact) => boolean = () => true): Artifact[] {
    return this.artifactList.filter(predicate);
  }

  /** Most recently added artifact with this name. */
  latestArtifact(name: string): Artifact | undefined {
    for (let i = this.artifactList.length - 1; i >= 0; i--) {
      const artifact = this.artifactList[i];
      if (artifact?.name === name) return artifact;
    }
    return undefined;
  }

  /** Subscribers see every event published after this call. */
  events(): Subscription<BlackboardEvent> {
    return this.bus.subscribe();
  }

  emitWarning(message: string): void {
    this.bus.publish({ type: "warning", message });
  }

  emitError(message: string): void {
    this.bus.publish({ type: "error", message });
  }

  close(): void {
    this.bus.closeAll();
  }
}

function isExpired(fact: Fact, now: number): boolean {
  if (fact.ttlSeconds === undefined) return false;
  return now - Date.parse(fact.createdAt) >= fact.ttlSeconds * 1000;
}
