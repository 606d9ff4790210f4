import type {
  AutomationAction,
  AutomationPreferences,
  AutomationProfile,
  AutomationToggles,
  GuardrailVerdict,
} from "./types.ts";
import { DEFAULT_TOGGLES } from "./types.ts";

// ── Guardrail Config ────────────────────────────────────────────────────────

export interface GuardrailConfig {
  readonly rateLimitMs: number;
  readonly cacheWindowMs: number;
  readonly circuitWindowMs: number;
  readonly circuitThreshold: number;
  readonly circuitCooldownMs: number;
}

export const DEFAULT_GUARDRAIL_CONFIG: GuardrailConfig = {
  rateLimitMs: 45_000,
  cacheWindowMs: 24 * 60 * 60 * 1000,
  circuitWindowMs: 3 * 60 * 1000,
  circuitThreshold: 2,
  circuitCooldownMs: 10 * 60 * 1000,
};

export interface GuardrailInit {
  readonly profile?: AutomationProfile;
  readonly toggles?: AutomationToggles;
  readonly killSwitch?: boolean;
  readonly pausedUntil?: Date | null;
  readonly config?: Partial<GuardrailConfig>;
}

// ── Guardrail State ─────────────────────────────────────────────────────────
// Owns the profile, toggles, kill switch, manual pause, rate-limit timestamp,
// circuit breaker and action cache. Every method is synchronous, so callers on
// the event loop never observe a partial update.

export class GuardrailState {
  private readonly config: GuardrailConfig;
  private profile: AutomationProfile;
  private toggles: AutomationToggles;
  private killSwitch: boolean;
  private pausedUntil: number | null;
  private lastActionAtMs: number | null = null;
  private errorTimestamps: number[] = [];
  private circuitOpenUntil: number | null = null;
  private readonly cachedActions = new Map<string, number>();

  constructor(init: GuardrailInit = {}) {
    this.config = { ...DEFAULT_GUARDRAIL_CONFIG, ...init.config };
    this.profile = init.profile ?? "off";
    this.toggles = init.toggles ?? DEFAULT_TOGGLES;
    this.killSwitch = init.killSwitch ?? false;
    this.pausedUntil = init.pausedUntil ? init.pausedUntil.getTime() : null;
  }

  // ── Settings ────────────────────────────────────────────────────────────

  updateProfile(profile: AutomationProfile): void {
    this.profile = profile;
  }

  updateToggles(toggles: AutomationToggles): void {
    this.toggles = { ...toggles };
  }

  setKillSwitch(enabled: boolean): void {
    this.killSwitch = enabled;
  }

  pause(until: Date): void {
    this.pausedUntil = until.getTime();
  }

  clearPause(): void {
    this.pausedUntil = null;
  }

  // ── Outcomes ────────────────────────────────────────────────────────────

  registerActionSuccess(action: AutomationAction, now: Date): void {
    const at = now.getTime();
    this.lastActionAtMs = at;
    this.cachedActions.set(action.cacheKey, at);
    this.purgeExpiredCache(at);
  }

  /**
   * Record a failed or timed-out run. Reaching the threshold inside the
   * circuit window opens the circuit for the cooldown and clears the history,
   * so the next window starts from zero.
   */
  registerActionFailure(now: Date): void {
    const at = now.getTime();
    this.lastActionAtMs = at;
    this.errorTimestamps.push(at);
    this.purgeErrorHistory(at);
    if (this.errorTimestamps.length >= this.config.circuitThreshold) {
      this.circuitOpenUntil = at + this.config.circuitCooldownMs;
      this.errorTimestamps = [];
    }
  }

  resetCircuit(): void {
    this.circuitOpenUntil = null;
    this.errorTimestamps = [];
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  /** Order matters: disabled, then manual pause, then circuit, then rate limit. */
  guardrailState(now: Date): GuardrailVerdict {
    const at = now.getTime();

    if (this.killSwitch || this.profile === "off") {
      return { kind: "disabled" };
    }
    if (this.pausedUntil !== null && this.pausedUntil > at) {
      return { kind: "manually_paused", until: new Date(this.pausedUntil) };
    }
    if (this.circuitOpenUntil !== null && this.circuitOpenUntil > at) {
      return { kind: "circuit_open", until: new Date(this.circuitOpenUntil) };
    }
    if (this.lastActionAtMs !== null && at - this.lastActionAtMs < this.config.rateLimitMs) {
      return {
        kind: "rate_limited",
        until: new Date(this.lastActionAtMs + this.config.rateLimitMs),
      };
    }
    return { kind: "ready" };
  }

  /** Snapshot for one decision. An expired pause is reported as null. */
  preferences(now: Date): AutomationPreferences {
    const activePause =
      this.pausedUntil !== null && this.pausedUntil > now.getTime()
        ? new Date(this.pausedUntil)
        : null;
    return {
      profile: this.profile,
      toggles: { ...this.toggles },
      killSwitch: this.killSwitch,
      pausedUntil: activePause,
    };
  }

  shouldSkipDueToCache(action: AutomationAction, now: Date): boolean {
    const at = now.getTime();
    this.purgeExpiredCache(at);
    const cachedAt = this.cachedActions.get(action.cacheKey);
    return cachedAt !== undefined && at - cachedAt < this.config.cacheWindowMs;
  }

  get lastActionAt(): Date | null {
    return this.lastActionAtMs === null ? null : new Date(this.lastActionAtMs);
  }

  recentFailureCount(now: Date): number {
    this.purgeErrorHistory(now.getTime());
    return this.errorTimestamps.length;
  }

  // ── Housekeeping ────────────────────────────────────────────────────────

  private purgeExpiredCache(at: number): void {
    for (const [key, cachedAt] of this.cachedActions) {
      if (at - cachedAt >= this.config.cacheWindowMs) {
        this.cachedActions.delete(key);
      }
    }
  }

  private purgeErrorHistory(at: number): void {
    this.errorTimestamps = this.errorTimestamps.filter(
      (ts) => at - ts < this.config.circuitWindowMs,
    );
  }
}
