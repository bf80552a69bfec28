/**
 * Anthropic Tutoring Service
 *
 * Implements the engine's TutoringService contract on top of a completion
 * client. Each request is self-contained: the prompt is built from the item,
 * the learner's current controller state for its domain and the outcome that
 * led here. No conversation history is kept.
 */

import type { TutoringService, TutorPromptRequest } from '../core/ports';
import type { CompletionClient } from './types';
import { LLMError } from './types';

const STATE_GUIDANCE = {
  nominal: 'The learner is progressing normally. Keep the tone neutral and brief.',
  struggling:
    'The learner is struggling in this area. Be encouraging, and frame the question so the first step is small.',
  accelerating:
    'The learner is doing very well. Be brisk and invite them to stretch a little further.',
} as const;

const OUTCOME_GUIDANCE = {
  correct: 'Their last answer was correct.',
  partial: 'Their last answer was partly correct.',
  incorrect: 'Their last answer was incorrect; do not dwell on it.',
} as const;

/**
 * Builds the instruction sent to the model for one tutor prompt.
 */
export function buildTutorInstruction(request: TutorPromptRequest): string {
  const { item, domainState, previousOutcome } = request;
  const lines = [
    'You are a concise tutor inside a spaced-repetition practice session.',
    `Write one short prompt (at most two sentences) that introduces the next exercise.`,
    `Exercise reference: ${item.payloadRef}`,
    `Skill domains: ${item.skillDomains.join(', ')}`,
    `Difficulty: ${item.baseDifficulty.toFixed(1)} on a scale of 0.3 to 5.0`,
    STATE_GUIDANCE[domainState],
  ];
  if (previousOutcome) {
    lines.push(OUTCOME_GUIDANCE[previousOutcome]);
  }
  lines.push('Do not reveal the answer. Reply with the prompt text only.');
  return lines.join('\n');
}

/**
 * @example
 * ```typescript
 * const tutor = new AnthropicTutoringService(new AnthropicClient());
 * const orchestrator = new SessionOrchestrator({ store, durable, content, analytics, tutor });
 * ```
 */
export class AnthropicTutoringService implements TutoringService {
  constructor(private readonly client: CompletionClient) {}

  /**
   * @throws LLMError if the model fails or returns no text
   */
  async composePrompt(request: TutorPromptRequest): Promise<string> {
    const response = await this.client.complete(buildTutorInstruction(request));
    const text = response.text.trim();
    if (text.length === 0) {
      throw new LLMError(`Empty tutor prompt for item '${request.item.id}'`, 'empty_response');
    }
    return text;
  }
}
