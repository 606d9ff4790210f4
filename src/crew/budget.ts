import type { Budgets } from "./types.ts";

export type BudgetLimit = "wallClock" | "toolCalls" | "tokens";

/** Usage of one crew run, measured against its contract budgets. */
export class BudgetCounters {
  private toolCallCount = 0;
  private tokenCount = 0;
  private readonly startedAt: number;

  constructor(
    private readonly budgets: Budgets,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.startedAt = clock().getTime();
  }

  register(toolCalls: number, tokens: number): void {
    this.toolCallCount += toolCalls;
    this.tokenCount += tokens;
  }

  get toolCalls(): number {
    return this.toolCallCount;
  }

  get tokens(): number {
    return this.tokenCount;
  }

  elapsedMs(): number {
    return this.clock().getTime() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.budgets.wallClockSec * 1000 - this.elapsedMs());
  }

  /** First budget that has been reached, or null while all have headroom. */
  exhausted(): BudgetLimit | null {
    if (this.elapsedMs() >= this.budgets.wallClockSec * 1000) return "wallClock";
    if (this.toolCallCount >= this.budgets.maxToolCalls) return "toolCalls";
    if (this.tokenCount >= this.budgets.maxTokensTotal) return "tokens";
    return null;
  }
}
