/**
 * Integration Tests: SQLite Durable Store
 *
 * Runs the DurableStore contract against an in-memory database with the
 * real migrations: versioned review-state writes, session snapshots, the
 * event log and the retention purge.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteDurableStore } from '../../src/storage/sqlite-durable-store';
import { createTestDatabase, cleanupTestDatabase, type TestDatabaseContext } from '../setup';
import {
  BASE_TIME,
  createEvent,
  createReviewState,
  createSessionContext,
  daysFrom,
} from '../helpers';

describe('SqliteDurableStore', () => {
  let ctx: TestDatabaseContext;
  let store: SqliteDurableStore;

  beforeEach(() => {
    ctx = createTestDatabase();
    store = new SqliteDurableStore(ctx.db);
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  // ==========================================================================
  // Review states
  // ==========================================================================

  describe('compareAndSwapReviewState', () => {
    const reviewed = createReviewState({
      itemId: 'item_a',
      repetitions: 1,
      reviewCount: 1,
      stability: 1,
      difficulty: 2.35,
      lastReviewedAt: BASE_TIME,
      nextDueAt: daysFrom(BASE_TIME, 1),
    });

    it('inserts a first state at version 1', async () => {
      const result = await store.compareAndSwapReviewState(reviewed, 0);

      expect(result).toEqual({ ok: true, state: { ...reviewed, version: 1 } });
      expect(await store.getReviewState('user_1', 'item_a')).toEqual({ ...reviewed, version: 1 });
    });

    it('rejects a second first-write and returns the stored state', async () => {
      await store.compareAndSwapReviewState(reviewed, 0);

      const result = await store.compareAndSwapReviewState({ ...reviewed, stability: 9 }, 0);

      expect(result).toEqual({ ok: false, current: { ...reviewed, version: 1 } });
    });

    it('updates only when the expected version matches', async () => {
      await store.compareAndSwapReviewState(reviewed, 0);
      const next = { ...reviewed, version: 1, stability: 3.2, reviewCount: 2, repetitions: 2 };

      const first = await store.compareAndSwapReviewState(next, 1);
      const stale = await store.compareAndSwapReviewState({ ...next, stability: 50 }, 1);

      expect(first).toEqual({ ok: true, state: { ...next, version: 2 } });
      expect(stale.ok).toBe(false);
      if (!stale.ok) {
        expect(stale.current?.version).toBe(2);
        expect(stale.current?.stability).toBe(3.2);
      }
    });

    it('reports no current state when the row to update is missing', async () => {
      const result = await store.compareAndSwapReviewState({ ...reviewed, version: 4 }, 4);

      expect(result).toEqual({ ok: false, current: null });
    });
  });

  describe('listReviewStates / listLapsedReviewStates', () => {
    beforeEach(async () => {
      await store.compareAndSwapReviewState(createReviewState({ itemId: 'item_a' }), 0);
      await store.compareAndSwapReviewState(createReviewState({ itemId: 'item_b', lapses: 2 }), 0);
      await store.compareAndSwapReviewState(createReviewState({ itemId: 'item_c', lapses: 1 }), 0);
      await store.compareAndSwapReviewState(
        createReviewState({ userId: 'user_2', itemId: 'item_a', lapses: 5 }),
        0
      );
    });

    it("lists a user's states, optionally restricted to some items", async () => {
      const all = await store.listReviewStates('user_1');
      const some = await store.listReviewStates('user_1', ['item_b', 'item_missing']);
      const none = await store.listReviewStates('user_1', []);

      expect(all.map((s) => s.itemId).sort()).toEqual(['item_a', 'item_b', 'item_c']);
      expect(some.map((s) => s.itemId)).toEqual(['item_b']);
      expect(none).toEqual([]);
    });

    it('lists states at or above the lapse threshold for one user', async () => {
      const lapsed = await store.listLapsedReviewStates('user_1', 2);

      expect(lapsed.map((s) => s.itemId)).toEqual(['item_b']);
    });
  });

  // ==========================================================================
  // Session contexts
  // ==========================================================================

  describe('session contexts', () => {
    const session = createSessionContext({
      id: 'sess_round_trip',
      status: 'paused',
      queue: [
        {
          itemId: 'item_a',
          skillDomains: ['greetings'],
          baseDifficulty: 2.5,
          payloadRef: 'content://item_a',
          nextDueAt: daysFrom(BASE_TIME, 1),
          stability: 1,
          source: 'due',
        },
        {
          itemId: 'item_b',
          skillDomains: ['greetings', 'travel'],
          baseDifficulty: 3.5,
          payloadRef: 'content://item_b',
          nextDueAt: BASE_TIME,
          stability: 0,
          source: 'escalation',
        },
      ],
      cursor: 1,
      interactionCount: 1,
      effectiveness: { greetings: 0.986667 },
      domainStates: {
        greetings: { state: 'nominal', aboveHighStreak: 1, recoveryStreak: 0, transitions: 0 },
      },
      windows: {
        greetings: [
          {
            eventId: 'evt_a',
            itemId: 'item_a',
            outcome: 'correct',
            latencyMs: 2000,
            occurredAt: BASE_TIME,
          },
        ],
      },
      appliedEventIds: ['evt_a'],
      outcomeCounts: { correct: 1, incorrect: 0, partial: 0 },
      totalLatencyMs: 2000,
      recentOutcomes: ['correct'],
      pausedAt: daysFrom(BASE_TIME, 0.01),
    });

    it('round-trips every field, including dates', async () => {
      await store.putSessionContext(session);

      expect(await store.getSessionContext('sess_round_trip')).toEqual(session);
    });

    it('returns null for an unknown session', async () => {
      expect(await store.getSessionContext('sess_missing')).toBeNull();
    });

    it('overwrites the previous snapshot', async () => {
      await store.putSessionContext(session);
      await store.putSessionContext({ ...session, status: 'active', cursor: 2 });

      const stored = await store.getSessionContext('sess_round_trip');
      expect(stored?.status).toBe('active');
      expect(stored?.cursor).toBe(2);
    });

    it('rejects a corrupted payload', async () => {
      await store.putSessionContext(session);
      ctx.sqlite
        .prepare('UPDATE session_contexts SET payload = ? WHERE id = ?')
        .run('{"id":"sess_round_trip"}', 'sess_round_trip');

      await expect(store.getSessionContext('sess_round_trip')).rejects.toThrow();
    });
  });

  // ==========================================================================
  // Event log and purge
  // ==========================================================================

  describe('event log', () => {
    it("lists a session's events in sequence order and ignores re-appends", async () => {
      const second = createEvent('sess_log', 'item_b', 'incorrect', { latencyMs: 4000 });
      const first = createEvent('sess_log', 'item_a', 'correct');

      await store.appendInteraction({ event: second, userId: 'user_1', sequence: 2 });
      await store.appendInteraction({ event: first, userId: 'user_1', sequence: 1 });
      await store.appendInteraction({ event: first, userId: 'user_1', sequence: 1 });

      const records = await store.listInteractions('sess_log');

      expect(records.map((r) => r.sequence)).toEqual([1, 2]);
      expect(records[0]).toEqual({ event: first, userId: 'user_1', sequence: 1 });
      expect(records[1].event.latencyMs).toBe(4000);
    });
  });

  describe('purgeEndedSessions', () => {
    it('removes sessions that ended before the cutoff, with their events', async () => {
      await store.putSessionContext(
        createSessionContext({
          id: 'sess_old',
          status: 'completed',
          endedAt: daysFrom(BASE_TIME, -2),
        })
      );
      await store.putSessionContext(
        createSessionContext({ id: 'sess_recent', status: 'completed', endedAt: BASE_TIME })
      );
      await store.putSessionContext(createSessionContext({ id: 'sess_live' }));
      await store.appendInteraction({
        event: createEvent('sess_old', 'item_a', 'correct'),
        userId: 'user_1',
        sequence: 1,
      });

      const purged = await store.purgeEndedSessions(daysFrom(BASE_TIME, -1));

      expect(purged).toBe(1);
      expect(await store.getSessionContext('sess_old')).toBeNull();
      expect(await store.listInteractions('sess_old')).toEqual([]);
      expect(await store.getSessionContext('sess_recent')).not.toBeNull();
      expect(await store.getSessionContext('sess_live')).not.toBeNull();
    });
  });
});
