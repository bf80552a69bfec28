import { describe, it, expect, vi } from 'vitest';
import { AnthropicTutoringService, buildTutorInstruction } from './tutoring-service';
import { LLMError, type CompletionClient, type LLMResponse } from './types';
import { createLearningItem } from '../../tests/helpers';

function response(text: string): LLMResponse {
  return { text, usage: { inputTokens: 10, outputTokens: 5 }, stopReason: 'end_turn' };
}

describe('buildTutorInstruction', () => {
  const item = createLearningItem({
    id: 'greet_1',
    skillDomains: ['greetings', 'formality'],
    baseDifficulty: 1.5,
    payloadRef: 'content://greet_1',
  });

  it('describes the item and the domain state', () => {
    const instruction = buildTutorInstruction({ item, domainState: 'struggling' });
    const lines = instruction.split('\n');

    expect(lines).toContain('Exercise reference: content://greet_1');
    expect(lines).toContain('Skill domains: greetings, formality');
    expect(lines).toContain('Difficulty: 1.5 on a scale of 0.3 to 5.0');
    expect(lines).toContain(
      'The learner is struggling in this area. Be encouraging, and frame the question so the first step is small.'
    );
    expect(lines[lines.length - 1]).toBe('Do not reveal the answer. Reply with the prompt text only.');
  });

  it('mentions the previous outcome only when there is one', () => {
    const without = buildTutorInstruction({ item, domainState: 'nominal' });
    const withOutcome = buildTutorInstruction({
      item,
      domainState: 'nominal',
      previousOutcome: 'partial',
    });

    expect(without.split('\n')).toHaveLength(7);
    expect(withOutcome.split('\n')).toHaveLength(8);
    expect(withOutcome.split('\n')).toContain('Their last answer was partly correct.');
  });
});

describe('AnthropicTutoringService', () => {
  const item = createLearningItem({ id: 'greet_2' });

  it('returns the trimmed completion text', async () => {
    const complete = vi.fn(async () => response('  What would you say to a neighbour?\n'));
    const client: CompletionClient = { complete };
    const tutor = new AnthropicTutoringService(client);

    const text = await tutor.composePrompt({ item, domainState: 'accelerating' });

    expect(text).toBe('What would you say to a neighbour?');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith(buildTutorInstruction({ item, domainState: 'accelerating' }));
  });

  it('rejects an empty completion', async () => {
    const tutor = new AnthropicTutoringService({ complete: async () => response('   ') });

    await expect(tutor.composePrompt({ item, domainState: 'nominal' })).rejects.toBeInstanceOf(
      LLMError
    );
    await expect(tutor.composePrompt({ item, domainState: 'nominal' })).rejects.toHaveProperty(
      'type',
      'empty_response'
    );
  });

  it('propagates client failures', async () => {
    const failure = new LLMError('rate limited', 'rate_limit');
    const tutor = new AnthropicTutoringService({
      complete: async () => {
        throw failure;
      },
    });

    await expect(tutor.composePrompt({ item, domainState: 'nominal' })).rejects.toBe(failure);
  });
});
