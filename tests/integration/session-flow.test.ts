/**
 * Integration Tests: Session Flow over SQLite
 *
 * Drives the orchestrator end to end against the real storage adapters:
 * queue construction from the catalog and stored review states,
 * compare-and-swap review writes shared across sessions, write-behind
 * flushes on end and eviction, read-through, idle sweeps, retention purge
 * and effectiveness replay from the event log.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createTestContext,
  cleanupTestContext,
  seedCatalog,
  type TestContext,
} from '../setup';
import { BASE_TIME, createEvent, createLearningItem, createReviewState, DAY, daysFrom } from '../helpers';
import { SessionNotFoundError } from '../../src/core/errors';
import type { Outcome } from '../../src/core/models';

const MINUTE = 60 * 1000;

describe('Session flow over SQLite', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await seedCatalog(ctx.db, [
      createLearningItem({ id: 'greet_a', baseDifficulty: 2.0 }),
      createLearningItem({ id: 'greet_b', baseDifficulty: 2.5 }),
      createLearningItem({ id: 'greet_c', baseDifficulty: 3.0 }),
      createLearningItem({ id: 'train_times', skillDomains: ['travel'], baseDifficulty: 2.0 }),
    ]);
    // greet_c was reviewed recently and is not due yet
    await ctx.engine.durable.compareAndSwapReviewState(
      createReviewState({
        itemId: 'greet_c',
        repetitions: 1,
        reviewCount: 1,
        stability: 3,
        lastReviewedAt: BASE_TIME,
        nextDueAt: daysFrom(BASE_TIME, 3),
      }),
      0
    );
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  function answer(sessionId: string, itemId: string, outcome: Outcome, extraCurricular = false) {
    return ctx.engine.orchestrator.interact(
      sessionId,
      createEvent(sessionId, itemId, outcome, {
        occurredAt: ctx.clock.now(),
        ...(extraCurricular && { extraCurricular }),
      })
    );
  }

  it('queues unseen and due items, easiest first, and skips items not yet due', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);

    expect(session.queue.map((e) => e.itemId)).toEqual(['greet_a', 'greet_b']);
    expect(session.queue.every((e) => e.source === 'due')).toBe(true);
  });

  it('persists the review state with version 1 on the first answer', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);

    const response = await answer(session.id, 'greet_a', 'correct');

    expect(response.applied).toBe(true);
    expect(response.cursor).toBe(1);
    expect(response.remaining).toBe(1);
    expect(response.nextItem?.itemId).toBe('greet_b');
    expect(response.reviewState).toMatchObject({
      itemId: 'greet_a',
      stability: 1,
      version: 1,
      nextDueAt: daysFrom(BASE_TIME, 1),
    });

    const stored = await ctx.engine.durable.getReviewState('user_1', 'greet_a');
    expect(stored?.version).toBe(1);
    expect(stored?.difficulty).toBeCloseTo(1.85, 10);
  });

  it('continues the same review state in a later session', async () => {
    const first = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);
    await answer(first.id, 'greet_a', 'correct');
    await ctx.engine.orchestrator.endSession(first.id);

    ctx.clock.advance(DAY);
    const second = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);
    expect(second.queue.map((e) => e.itemId)).toContain('greet_a');

    const response = await answer(second.id, 'greet_a', 'correct');

    // 1 day * (1 + (5 - 1.85) * 0.5)
    expect(response.reviewState?.version).toBe(2);
    expect(response.reviewState?.stability).toBeCloseTo(2.575, 10);
    expect(response.reviewState?.repetitions).toBe(2);
  });

  it('flushes the session on end and reads it back through after eviction', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);
    await answer(session.id, 'greet_a', 'correct');

    const summary = await ctx.engine.orchestrator.endSession(session.id);

    expect(summary).toMatchObject({
      status: 'completed',
      interactionCount: 1,
      accuracy: 1,
      itemsReviewed: 1,
      itemsRemaining: 1,
      persisted: true,
    });
    expect(ctx.engine.store.isResident(session.id)).toBe(false);

    const durable = await ctx.engine.durable.getSessionContext(session.id);
    expect(durable?.status).toBe('completed');
    expect(durable?.cursor).toBe(1);

    const reread = await ctx.engine.orchestrator.getSession(session.id);
    expect(reread).toEqual(durable);
  });

  it('logs applied events in order', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);
    await answer(session.id, 'greet_a', 'correct');
    await answer(session.id, 'greet_b', 'partial');
    await ctx.engine.store.flush(session.id);

    const log = await ctx.engine.durable.listInteractions(session.id);

    expect(log.map((r) => [r.sequence, r.event.itemId, r.event.outcome])).toEqual([
      [1, 'greet_a', 'correct'],
      [2, 'greet_b', 'partial'],
    ]);
  });

  it('accepts an extra-curricular review of a catalog item outside the queue', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);

    const response = await answer(session.id, 'train_times', 'correct', true);

    expect(response.applied).toBe(true);
    expect(response.nextItem?.itemId).toBe('greet_a');
    const current = await ctx.engine.orchestrator.getSession(session.id);
    expect(current.queue.map((e) => [e.itemId, e.source])).toEqual([
      ['train_times', 'extra_curricular'],
      ['greet_a', 'due'],
      ['greet_b', 'due'],
    ]);
  });

  it('evicts idle sessions and applies the next interaction from the durable copy', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);

    ctx.clock.advance(31 * MINUTE);
    const evicted = await ctx.engine.orchestrator.sweepIdleSessions();

    expect(evicted).toBe(1);
    expect(ctx.engine.store.isResident(session.id)).toBe(false);
    expect((await ctx.engine.durable.getSessionContext(session.id))?.status).toBe('active');

    const response = await answer(session.id, 'greet_a', 'correct');
    expect(response.applied).toBe(true);
    expect(response.cursor).toBe(1);
  });

  it('interrupts resident sessions on shutdown and resumes them afterwards', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);

    await ctx.engine.orchestrator.stop();
    expect((await ctx.engine.durable.getSessionContext(session.id))?.status).toBe('interrupted');

    const resumed = await ctx.engine.orchestrator.resumeSession(session.id);
    expect(resumed.status).toBe('active');

    const response = await answer(session.id, 'greet_a', 'correct');
    expect(response.applied).toBe(true);
  });

  it('purges ended sessions once the retention grace has passed', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);
    await answer(session.id, 'greet_a', 'correct');
    await ctx.engine.orchestrator.endSession(session.id);

    ctx.clock.advance(30 * MINUTE + DAY - 1);
    expect(await ctx.engine.orchestrator.purgeExpiredSessions()).toBe(0);

    ctx.clock.advance(2);
    expect(await ctx.engine.orchestrator.purgeExpiredSessions()).toBe(1);

    await expect(ctx.engine.orchestrator.getSession(session.id)).rejects.toBeInstanceOf(
      SessionNotFoundError
    );
    expect(await ctx.engine.durable.listInteractions(session.id)).toEqual([]);
  });

  it('replays the effectiveness signal from the event log', async () => {
    const session = await ctx.engine.orchestrator.startSession('user_1', ['greetings']);
    await answer(session.id, 'greet_a', 'correct');
    await answer(session.id, 'greet_b', 'incorrect');

    const replayed = await ctx.engine.orchestrator.replayEffectiveness(session.id);
    const current = await ctx.engine.orchestrator.getSession(session.id);

    expect(replayed.windows.greetings).toHaveLength(2);
    expect(replayed.effectiveness).toEqual(current.effectiveness);
  });
});
