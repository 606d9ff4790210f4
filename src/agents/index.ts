// ── Claude Client ────────────────────────────────────────────────────────────
export {
  type ClaudeClient,
  type ClaudeMessage,
  type ClaudeMessageParams,
  type ClaudeMessageResult,
  DEFAULT_AGENT_MODEL,
  AnthropicClaudeClient,
  MockClaudeClient,
} from "./claude-client.ts";

// ── Claude Agent Runtime ─────────────────────────────────────────────────────
export {
  type ClaudeAgentRuntimeConfig,
  DEFAULT_CLAUDE_AGENT_CONFIG,
  ClaudeAgentRuntime,
  type AgentReply,
  parseAgentReply,
} from "./claude-agent-runtime.ts";
