/**
 * LLM Types and Interfaces
 *
 * A thin abstraction over the Anthropic SDK types, so the tutoring adapter
 * and its tests never touch SDK classes directly.
 */

/**
 * Configuration options for LLM API calls.
 * All fields are optional and fall back to the client's defaults.
 */
export interface LLMConfig {
  /** Model to use for completions */
  model?: string;

  /** Maximum number of tokens to generate in the response */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0).
   * Lower values = more deterministic.
   */
  temperature?: number;
}

/**
 * Result of a complete (non-streaming) API call.
 */
export interface LLMResponse {
  text: string;

  /** Token usage; null if the API did not report it */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use' | null;
}

/**
 * Anything that can answer a single-turn completion. AnthropicClient is the
 * production implementation; tests pass a stub.
 */
export interface CompletionClient {
  complete(prompt: string, config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Anthropic server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'empty_response'   // Model returned no text
  | 'unknown';

/**
 * Custom error class for LLM-related errors.
 */
export class LLMError extends Error {
  type: LLMErrorType;
  cause?: Error;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message);
    this.name = 'LLMError';
    this.type = type;
    this.cause = cause;
  }
}
