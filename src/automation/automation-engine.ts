import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { JsonLinesLog } from "../observability/run-log.ts";
import { EventBus } from "../events/event-bus.ts";
import type { Subscription } from "../events/event-bus.ts";
import { AppError, errorMessage, presentError } from "../types/errors.ts";
import { OperationCancelledError, TimeoutError, withTimeout } from "../runtime/cancellation.ts";
import { GuardrailState } from "./guardrail-state.ts";
import { actionFor, createRuleContext, DEFAULT_NULL_THRESHOLD } from "./rule-engine.ts";
import type {
  AutomationAction,
  AutomationEvent,
  AutomationProfile,
  AutomationToggles,
  EnginePhase,
  EngineStatus,
  GuardrailVerdict,
  PlaybookRunner,
} from "./types.ts";
import { EVALUATING, IDLE, describePhase, paused, running } from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface AutomationEngineConfig {
  readonly runnerTimeoutMs: number;
  readonly nullThreshold: number;
  /** Cooldown entered by stop() and pauseForTenMinutes(). */
  readonly stopPauseMs: number;
}

export const DEFAULT_AUTOMATION_ENGINE_CONFIG: AutomationEngineConfig = {
  runnerTimeoutMs: 120_000,
  nullThreshold: DEFAULT_NULL_THRESHOLD,
  stopPauseMs: 10 * 60 * 1000,
};

export const CACHED_REASON = "Skipped: cached within 24h";

// ── Dependencies ────────────────────────────────────────────────────────────

export interface AutomationEngineDeps {
  readonly bus: EventBus<AutomationEvent>;
  readonly runner: PlaybookRunner;
  readonly state?: GuardrailState;
  readonly runLog?: JsonLinesLog;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  readonly config?: Partial<AutomationEngineConfig>;
}

// ── Automation Engine ───────────────────────────────────────────────────────

/**
 * Turns automation events into guarded playbook runs. Events are handled one
 * at a time; a run that fails, times out or is stopped never escapes
 * `handle()`, it only shows up in the status stream and the run log.
 */
export class AutomationEngine {
  readonly state: GuardrailState;

  private readonly config: AutomationEngineConfig;
  private readonly bus: EventBus<AutomationEvent>;
  private readonly runner: PlaybookRunner;
  private readonly runLog: JsonLinesLog | undefined;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private readonly statusBus = new EventBus<EngineStatus>();
  private current: EngineStatus = { phase: IDLE, lastActionAt: null };

  private tail: Promise<void> = Promise.resolve();
  private subscription: Subscription<AutomationEvent> | null = null;
  private pump: Promise<void> | null = null;
  private inFlight: AbortController | null = null;

  constructor(deps: AutomationEngineDeps) {
    this.config = { ...DEFAULT_AUTOMATION_ENGINE_CONFIG, ...deps.config };
    this.bus = deps.bus;
    this.runner = deps.runner;
    this.state = deps.state ?? new GuardrailState();
    this.runLog = deps.runLog;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "automation-engine" });
    this.clock = deps.clock ?? (() => new Date());
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Subscribe to the bus. Events published from here on are handled in order. */
  start(): void {
    if (this.subscription) return;
    const subscription = this.bus.subscribe();
    this.subscription = subscription;
    this.pump = this.consume(subscription);
    this.logger.info("automation_engine_started");
  }

  async close(): Promise<void> {
    const subscription = this.subscription;
    if (!subscription) return;
    this.subscription = null;
    subscription.close();
    await this.pump;
    await this.tail;
    this.pump = null;
    this.statusBus.closeAll();
    this.logger.info("automation_engine_closed");
  }

  private async consume(subscription: Subscription<AutomationEvent>): Promise<void> {
    for await (const event of subscription) {
      await this.handle(event);
    }
  }

  // ── Status ──────────────────────────────────────────────────────────────

  status(): EngineStatus {
    return this.current;
  }

  /** The current status is delivered first, then every change. */
  subscribeStatus(): Subscription<EngineStatus> {
    return this.statusBus.subscribe({ seed: this.current });
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  // ── Event Handling ──────────────────────────────────────────────────────

  /** Handle one event after every earlier one has finished. Never rejects. */
  handle(event: AutomationEvent): Promise<void> {
    const next = this.tail.then(() => this.process(event));
    this.tail = next.catch((err: unknown) => {
      this.logger.error("automation_event_crashed", {
        type: event.type,
        error: errorMessage(err),
      });
    });
    return this.tail;
  }

  private async process(event: AutomationEvent): Promise<void> {
    const now = this.clock();
    void this.runLog?.append("event", { type: event.type, ...eventFields(event) });
    this.setPhase(EVALUATING);

    if (event.type === "error_occurred") {
      this.state.registerActionFailure(now);
      this.logger.warn("automation_error_reported", { code: event.error.code });
      this.setPhase(paused(presentError(event.error)));
      return;
    }

    const verdict = this.state.guardrailState(now);
    const reason = verdictReason(verdict);
    if (reason !== null) {
      void this.runLog?.append("guardrail", { verdict: verdict.kind, reason });
      this.setPhase(paused(reason));
      return;
    }

    const context = createRuleContext(
      this.state.preferences(now),
      now,
      this.config.nullThreshold,
    );
    const action = actionFor(event, context);
    if (!action) {
      this.setPhase(IDLE);
      return;
    }

    if (this.state.shouldSkipDueToCache(action, now)) {
      void this.runLog?.append("skip", {
        reason: "cache",
        action: action.playbook.identifier,
        cacheKey: action.cacheKey,
      });
      this.setPhase(paused(CACHED_REASON));
      return;
    }

    await this.execute(action, now);
  }

  private async execute(action: AutomationAction, now: Date): Promise<void> {
    const { playbook } = action;
    const controller = new AbortController();
    this.inFlight = controller;
    this.setPhase(running(playbook.description));
    void this.runLog?.append("start", {
      action: playbook.identifier,
      dataset: playbook.dataset ?? "",
      parameters: playbook.parameters,
    });
    this.logger.info("automation_run_started", { action: playbook.identifier });

    try {
      await withTimeout(
        (signal) => this.runner.run(playbook, signal),
        this.config.runnerTimeoutMs,
        { signal: controller.signal },
      );
      this.state.registerActionSuccess(action, now);
      void this.runLog?.append("success", { action: playbook.identifier });
      this.logger.info("automation_run_succeeded", { action: playbook.identifier });
      this.setPhase(IDLE);
    } catch (err: unknown) {
      if (controller.signal.aborted && err instanceof OperationCancelledError) {
        void this.runLog?.append("cancelled", { action: playbook.identifier });
        this.logger.info("automation_run_cancelled", { action: playbook.identifier });
        this.setPhase(this.restingPhase(this.clock()));
        return;
      }
      this.recordFailure(action, err, now);
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  private recordFailure(action: AutomationAction, err: unknown, now: Date): void {
    const identifier = action.playbook.identifier;
    this.state.registerActionFailure(now);

    if (err instanceof TimeoutError) {
      const appError = new AppError("autoflowTimeout", "AutoFlow timed out");
      void this.runLog?.append("failure", { message: "timeout", action: identifier });
      this.logger.warn("automation_run_timed_out", {
        action: identifier,
        timeoutMs: err.timeoutMs,
      });
      this.setPhase(paused(presentError(appError)));
      return;
    }

    const appError =
      err instanceof AppError ? err : new AppError("autoflow", errorMessage(err));
    void this.runLog?.append("failure", {
      message: appError.message,
      code: appError.code,
      action: identifier,
    });
    this.logger.warn("automation_run_failed", {
      action: identifier,
      error: appError.describe(),
    });
    this.setPhase(paused(presentError(appError)));
  }

  // ── Controls ────────────────────────────────────────────────────────────

  /**
   * Cancel the in-flight run, if any, and enter the stop cooldown. A stopped
   * run counts as neither success nor failure.
   */
  async stop(): Promise<void> {
    const until = new Date(this.clock().getTime() + this.config.stopPauseMs);
    this.state.pause(until);
    this.inFlight?.abort(new OperationCancelledError("stopped"));
    await this.runner.stopCurrentRun();
    void this.runLog?.append("stop", { pausedUntil: until.toISOString() });
    this.logger.info("automation_stopped", { pausedUntil: until.toISOString() });
    this.setPhase(this.restingPhase(this.clock()));
  }

  updateProfile(profile: AutomationProfile): void {
    this.state.updateProfile(profile);
    this.broadcastResting();
  }

  updateToggles(toggles: AutomationToggles): void {
    this.state.updateToggles(toggles);
    this.broadcastResting();
  }

  setKillSwitch(enabled: boolean): void {
    this.state.setKillSwitch(enabled);
    this.broadcastResting();
  }

  pauseFor(durationMs: number): void {
    this.state.pause(new Date(this.clock().getTime() + durationMs));
    this.broadcastResting();
  }

  pauseForTenMinutes(): void {
    this.pauseFor(this.config.stopPauseMs);
  }

  resume(): void {
    this.state.clearPause();
    this.broadcastResting();
  }

  resetCircuit(): void {
    this.state.resetCircuit();
    this.broadcastResting();
  }

  // ── Internals ───────────────────────────────────────────────────────────

  /** A setting change never hides a run that is still in flight. */
  private broadcastResting(): void {
    if (this.inFlight) {
      this.setPhase(this.current.phase);
      return;
    }
    this.setPhase(this.restingPhase(this.clock()));
  }

  private restingPhase(now: Date): EnginePhase {
    const reason = verdictReason(this.state.guardrailState(now));
    return reason === null ? IDLE : paused(reason);
  }

  private setPhase(phase: EnginePhase): void {
    this.current = { phase, lastActionAt: this.state.lastActionAt };
    this.logger.debug("automation_phase", { phase: describePhase(phase) });
    this.statusBus.publish(this.current);
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Human-readable reason for a blocking verdict, null when ready. */
export function verdictReason(verdict: GuardrailVerdict): string | null {
  switch (verdict.kind) {
    case "ready":
      return null;
    case "disabled":
      return "AutoFlow disabled";
    case "manually_paused":
      return `Paused until ${verdict.until.toISOString()}`;
    case "circuit_open":
      return `Circuit open until ${verdict.until.toISOString()}`;
    case "rate_limited":
      return `Rate limited until ${verdict.until.toISOString()}`;
  }
}

function eventFields(event: AutomationEvent): Record<string, unknown> {
  switch (event.type) {
    case "dataset_mounted":
      return { dataset: event.dataset.path, sizeMB: event.dataset.sizeMB };
    case "run_finished":
      return {
        dataset: event.stats.dataset ?? "",
        nullPercentage: event.stats.nullPercentage,
        madeImages: event.stats.madeImages,
      };
    case "error_occurred":
      return { code: event.error.code, message: event.error.message };
    case "app_became_active":
      return {};
  }
}
