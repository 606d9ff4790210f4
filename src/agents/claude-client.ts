import Anthropic from "@anthropic-ai/sdk";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { cancellableSleep } from "../runtime/cancellation.ts";
import { AgentRuntimeError } from "../crew/agent-runtime.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export interface ClaudeClient {
  createMessage(params: ClaudeMessageParams): Promise<ClaudeMessageResult>;
}

export interface ClaudeMessage {
  readonly role: "user" | "assistant";
  readonly content: string;
}

export interface ClaudeMessageParams {
  readonly model: string;
  readonly system: string;
  readonly messages: readonly ClaudeMessage[];
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export interface ClaudeMessageResult {
  readonly content: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly stopReason: string;
  readonly durationMs: number;
}

export const DEFAULT_AGENT_MODEL = "claude-sonnet-4-5-20250929";

// ── Retry Configuration ──────────────────────────────────────────────────────

const RATE_LIMIT_BACKOFFS_MS = [2000, 4000, 8000];
const SERVER_ERROR_BACKOFFS_MS = [2000, 4000];

// ── Anthropic SDK Client ─────────────────────────────────────────────────────

export class AnthropicClaudeClient implements ClaudeClient {
  private readonly anthropic: Anthropic;
  private readonly logger: Logger;

  /**
   * @param anthropicInstance Pre-configured SDK instance. Defaults to one
   *   reading ANTHROPIC_API_KEY from the environment.
   */
  constructor(anthropicInstance?: Anthropic, logger?: Logger) {
    this.anthropic = anthropicInstance ?? new Anthropic();
    this.logger = (logger ?? NULL_LOGGER).child({ module: "claude-client" });
  }

  async createMessage(params: ClaudeMessageParams): Promise<ClaudeMessageResult> {
    const startTime = Date.now();
    const response = await this.callWithRetry(params);
    const durationMs = Date.now() - startTime;

    const content = response.content
      .filter((b): b is Anthropic.TextBlock => b.type === "text")
      .map((b) => b.text)
      .join("");

    this.logger.info("claude_request_completed", {
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      durationMs,
    });

    return {
      content,
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason ?? "unknown",
      durationMs,
    };
  }

  private async callWithRetry(params: ClaudeMessageParams): Promise<Anthropic.Message> {
    let rateLimitRetries = 0;
    let serverErrorRetries = 0;

    for (;;) {
      if (params.signal?.aborted) {
        throw new AgentRuntimeError("Request aborted", "ABORTED", "");
      }

      try {
        return await this.anthropic.messages.create(
          {
            model: params.model,
            system: params.system,
            messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
            max_tokens: params.maxTokens,
          },
          {
            timeout: params.timeoutMs,
            ...(params.signal ? { signal: params.signal } : {}),
          },
        );
      } catch (err: unknown) {
        const classified = classifyError(err);

        const rateLimitBackoff = RATE_LIMIT_BACKOFFS_MS[rateLimitRetries];
        if (classified === "rate_limited" && rateLimitBackoff !== undefined) {
          this.logger.warn("claude_rate_limited", {
            retryAttempt: rateLimitRetries + 1,
            backoffMs: rateLimitBackoff,
          });
          await cancellableSleep(rateLimitBackoff, params.signal);
          rateLimitRetries++;
          continue;
        }

        const serverBackoff = SERVER_ERROR_BACKOFFS_MS[serverErrorRetries];
        if (classified === "server_error" && serverBackoff !== undefined) {
          this.logger.warn("claude_server_error", {
            retryAttempt: serverErrorRetries + 1,
            backoffMs: serverBackoff,
          });
          await cancellableSleep(serverBackoff, params.signal);
          serverErrorRetries++;
          continue;
        }

        this.logger.error("claude_request_failed", {
          classification: classified,
          model: params.model,
          error: err instanceof Error ? err.message : String(err),
        });
        throw toAgentRuntimeError(classified, err);
      }
    }
  }
}

// ── Error Classification ─────────────────────────────────────────────────────

type ErrorClass = "rate_limited" | "server_error" | "timeout" | "aborted" | "non_retryable";

function classifyError(err: unknown): ErrorClass {
  // APIConnectionTimeoutError is an APIError subclass, so test it first.
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return "timeout";
  }

  if (err instanceof Anthropic.APIError) {
    const status = err.status ?? 0;
    if (status === 429) return "rate_limited";
    if (status >= 500 && status < 600) return "server_error";
    return "non_retryable";
  }

  if (err instanceof Error && err.name === "AbortError") {
    return "aborted";
  }

  return "non_retryable";
}

function toAgentRuntimeError(classification: ErrorClass, err: unknown): AgentRuntimeError {
  const cause = err instanceof Error ? err : undefined;
  const message = err instanceof Error ? err.message : "Unknown error calling Claude API";

  switch (classification) {
    case "rate_limited":
      return new AgentRuntimeError(`Rate limited after max retries: ${message}`, "RATE_LIMITED", "", cause);
    case "server_error":
      return new AgentRuntimeError(`Server error after max retries: ${message}`, "API_ERROR", "", cause);
    case "timeout":
      return new AgentRuntimeError(`Request timed out: ${message}`, "TIMEOUT", "", cause);
    case "aborted":
      return new AgentRuntimeError(`Request aborted: ${message}`, "ABORTED", "", cause);
    case "non_retryable":
      return new AgentRuntimeError(message, "API_ERROR", "", cause);
  }
}

// ── Mock Implementation ──────────────────────────────────────────────────────

/** In-process client for tests and dry runs. Records every call. */
export class MockClaudeClient implements ClaudeClient {
  readonly calls: ClaudeMessageParams[] = [];
  private errorToThrow: Error | null = null;

  constructor(
    private readonly responder: (
      params: ClaudeMessageParams,
      callIndex: number,
    ) => Partial<ClaudeMessageResult> = () => ({}),
  ) {}

  /** The next call rejects with this error. */
  failNext(error: Error): void {
    this.errorToThrow = error;
  }

  async createMessage(params: ClaudeMessageParams): Promise<ClaudeMessageResult> {
    if (params.signal?.aborted) {
      throw new AgentRuntimeError("Request aborted", "ABORTED", "");
    }
    const callIndex = this.calls.length;
    this.calls.push(params);

    const error = this.errorToThrow;
    if (error) {
      this.errorToThrow = null;
      throw error;
    }

    return {
      content: "{}",
      model: params.model,
      inputTokens: 100,
      outputTokens: 50,
      stopReason: "end_turn",
      durationMs: 1,
      ...this.responder(params, callIndex),
    };
  }
}
