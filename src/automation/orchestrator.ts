import type { EventBus } from "../events/event-bus.ts";
import { AppError, isAppErrorCode } from "../types/errors.ts";
import type { AutomationEngine } from "./automation-engine.ts";
import type { AutomationEvent } from "./types.ts";

// ── App Events ──────────────────────────────────────────────────────────────
// Raw events as collaborators report them, before translation.

export type AppEvent =
  | { readonly type: "dataset_mounted"; readonly path: string; readonly sizeBytes: number }
  | {
      readonly type: "run_finished";
      readonly nullPct: number;
      readonly madeImages: boolean;
      readonly dataset: string | null;
    }
  | { readonly type: "app_became_active" }
  | { readonly type: "error_occurred"; readonly code: string; readonly message: string };

const BYTES_PER_MB = 1_048_576;

export function translateAppEvent(event: AppEvent): AutomationEvent {
  switch (event.type) {
    case "dataset_mounted":
      return {
        type: "dataset_mounted",
        dataset: { path: event.path, sizeMB: event.sizeBytes / BYTES_PER_MB },
      };
    case "run_finished":
      return {
        type: "run_finished",
        stats: {
          dataset: event.dataset,
          artifacts: event.madeImages ? ["images"] : [],
          nullPercentage: event.nullPct,
          madeImages: event.madeImages,
        },
      };
    case "app_became_active":
      return { type: "app_became_active" };
    case "error_occurred": {
      const code = isAppErrorCode(event.code) ? event.code : "unknown";
      return { type: "error_occurred", error: new AppError(code, event.message) };
    }
  }
}

// ── Orchestrator ────────────────────────────────────────────────────────────

export class AutomationOrchestrator {
  constructor(
    private readonly bus: EventBus<AutomationEvent>,
    private readonly engine: AutomationEngine,
  ) {}

  post(event: AppEvent): void {
    this.bus.publish(translateAppEvent(event));
  }

  stop(): Promise<void> {
    return this.engine.stop();
  }
}
