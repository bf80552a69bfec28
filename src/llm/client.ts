/**
 * Anthropic Client Wrapper
 *
 * Wraps the Anthropic SDK for the single-turn completions the tutoring
 * adapter needs, and maps SDK failures onto typed LLMErrors.
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete('Phrase a warm-up question about greetings.');
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { CompletionClient, LLMConfig, LLMResponse } from './types';
import { LLMError, type LLMErrorType } from './types';
import { config as appConfig } from '../config';

const DEFAULT_TEMPERATURE = 0.7;

export interface AnthropicClientOptions extends LLMConfig {
  /** Defaults to ANTHROPIC_API_KEY from the loaded configuration */
  apiKey?: string;
  /** System prompt sent with every request */
  systemPrompt?: string;
}

/**
 * Wrapper class for the Anthropic API client.
 */
export class AnthropicClient implements CompletionClient {
  private client: Anthropic;
  private defaultConfig: Required<LLMConfig>;
  private systemPrompt: string | undefined;

  /**
   * @throws LLMError if no API key is configured
   */
  constructor(options: AnthropicClientOptions = {}) {
    const apiKey = options.apiKey ?? appConfig.anthropic.apiKey;
    if (!apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required for tutoring prompts.\n' +
          'Set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey });
    this.systemPrompt = options.systemPrompt;
    this.defaultConfig = {
      model: options.model ?? appConfig.anthropic.model,
      maxTokens: options.maxTokens ?? appConfig.anthropic.maxTokens,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Sends `prompt` as a single user message and returns the complete
   * response.
   *
   * @throws LLMError on API errors
   */
  async complete(prompt: string, config: LLMConfig = {}): Promise<LLMResponse> {
    try {
      const response = await this.client.messages.create({
        model: config.model ?? this.defaultConfig.model,
        max_tokens: config.maxTokens ?? this.defaultConfig.maxTokens,
        temperature: config.temperature ?? this.defaultConfig.temperature,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: prompt }],
      });

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    // Timeout extends APIConnectionError, so it is checked first
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to Anthropic API timed out.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError('Failed to connect to Anthropic API.', 'network', error);
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
