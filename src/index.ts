// ── Ambient ─────────────────────────────────────────────────────────────────
export * from "./config.ts";
export * from "./bootstrap.ts";
export * from "./types/index.ts";
export * from "./observability/index.ts";
export * from "./events/index.ts";
export * from "./runtime/index.ts";

// ── AutoFlow ────────────────────────────────────────────────────────────────
export * from "./automation/index.ts";

// ── Crew ────────────────────────────────────────────────────────────────────
export * from "./crew/index.ts";

// ── Agents ──────────────────────────────────────────────────────────────────
export * from "./agents/index.ts";
