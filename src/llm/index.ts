/**
 * LLM Module - Barrel Export
 *
 * Anthropic-backed implementation of the engine's tutoring contract.
 *
 * @example
 * ```typescript
 * import { AnthropicClient, AnthropicTutoringService } from './llm';
 *
 * const tutor = new AnthropicTutoringService(new AnthropicClient());
 * const text = await tutor.composePrompt({ item, domainState: 'nominal' });
 * ```
 */

export { AnthropicClient, type AnthropicClientOptions } from './client';
export { AnthropicTutoringService, buildTutorInstruction } from './tutoring-service';

export type { LLMConfig, LLMResponse, LLMErrorType, CompletionClient } from './types';

// Value export: callers check `instanceof LLMError`
export { LLMError } from './types';
