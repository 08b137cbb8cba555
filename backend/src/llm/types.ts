/**
 * LLM client core types
 *
 * Provider-neutral request/response shapes used by LLMClient and the
 * provider adapters.
 */

// ============================================================================
// Provider & Request
// ============================================================================

/** Supported LLM providers */
export type ProviderID = 'google';

/** Unified request parameters */
export interface LLMRequestParams {
  provider: ProviderID;
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  topP?: number;
  topK?: number;
  maxOutputTokens?: number;
}

/** Single-turn prompts only: every message is from the user. */
export interface LLMMessage {
  role: 'user';
  content: string;
}

// ============================================================================
// Response
// ============================================================================

/** Unified response format */
export interface LLMResponse {
  text: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

export type FinishReason = 'stop' | 'max_tokens' | 'error';

/** Token usage */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

// ============================================================================
// Error
// ============================================================================

/** Provider-level failure (HTTP status, malformed body, transport). */
export class LLMError extends Error {
  readonly provider: ProviderID;
  readonly statusCode: number;

  constructor(
    message: string,
    details: { provider: ProviderID; statusCode: number; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = 'LLMError';
    this.provider = details.provider;
    this.statusCode = details.statusCode;
  }
}
