/**
 * ItemScheduler Unit Tests
 *
 * Covers the interval and difficulty arithmetic for each outcome, the
 * clamping of malformed input, the due-date ordering guarantees and the
 * retention estimate read from the forgetting curve.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ItemScheduler, RetentionEstimator, DAY_MS } from './index';
import { SchedulerBoundsViolationError } from '../errors';
import type { ReviewState } from '../models';

const baseTime = new Date('2024-01-15T10:00:00Z');

function reviewedState(overrides: Partial<ReviewState> = {}): ReviewState {
  return {
    userId: 'user_1',
    itemId: 'item_1',
    repetitions: 3,
    reviewCount: 3,
    stability: 10,
    difficulty: 2.5,
    lastReviewedAt: new Date(baseTime.getTime() - 10 * DAY_MS),
    nextDueAt: baseTime,
    lapses: 0,
    version: 3,
    ...overrides,
  };
}

describe('ItemScheduler', () => {
  let scheduler: ItemScheduler;

  beforeEach(() => {
    scheduler = new ItemScheduler({ strictBounds: true });
  });

  describe('createInitialState', () => {
    it('is due immediately at the authored difficulty', () => {
      const state = scheduler.createInitialState('user_1', 'item_1', 2.5, baseTime);

      expect(state.repetitions).toBe(0);
      expect(state.reviewCount).toBe(0);
      expect(state.stability).toBe(0);
      expect(state.difficulty).toBe(2.5);
      expect(state.lastReviewedAt).toBeNull();
      expect(state.nextDueAt.getTime()).toBe(baseTime.getTime());
      expect(state.version).toBe(0);
    });

    it('clamps an out-of-range base difficulty', () => {
      expect(scheduler.createInitialState('u', 'i', 9, baseTime).difficulty).toBe(5.0);
      expect(scheduler.createInitialState('u', 'i', 0, baseTime).difficulty).toBe(0.3);
      expect(scheduler.createInitialState('u', 'i', NaN, baseTime).difficulty).toBe(2.5);
    });
  });

  describe('schedule', () => {
    it('sets stability to one day on the first correct answer', () => {
      const initial = scheduler.createInitialState('user_1', 'item_1', 2.5, baseTime);
      const next = scheduler.schedule(initial, 'correct', baseTime);

      expect(next.stability).toBe(1);
      expect(next.nextDueAt.getTime()).toBe(baseTime.getTime() + DAY_MS);
      expect(next.repetitions).toBe(1);
      expect(next.reviewCount).toBe(1);
      expect(next.difficulty).toBeCloseTo(2.35, 10);
      expect(next.lastReviewedAt?.getTime()).toBe(baseTime.getTime());
    });

    it('grows stability by the difficulty-scaled multiplier on later correct answers', () => {
      const state = reviewedState({ repetitions: 1, stability: 1, difficulty: 2.35 });
      const next = scheduler.schedule(state, 'correct', baseTime);

      // 1 + (5.0 - 2.35) * 0.5
      expect(next.stability).toBeCloseTo(2.325, 10);
      expect(next.difficulty).toBeCloseTo(2.2, 10);
    });

    it('resets stability and raises difficulty on a lapse', () => {
      const state = reviewedState();
      const next = scheduler.schedule(state, 'incorrect', baseTime);

      expect(next.stability).toBe(1);
      expect(next.difficulty).toBeCloseTo(2.8, 10);
      expect(next.lapses).toBe(1);
      expect(next.repetitions).toBe(0);
      expect(next.nextDueAt.getTime()).toBe(baseTime.getTime() + DAY_MS);
    });

    it('grows stability on a partial answer without changing difficulty', () => {
      const state = reviewedState({ repetitions: 2, stability: 4, difficulty: 3 });
      const next = scheduler.schedule(state, 'partial', baseTime);

      expect(next.stability).toBe(8);
      expect(next.difficulty).toBe(3);
      expect(next.repetitions).toBe(3);
      expect(next.lapses).toBe(0);
    });

    it('never grows stability by less than the minimum factor', () => {
      const state = reviewedState({ repetitions: 2, stability: 10, difficulty: 5 });
      const next = scheduler.schedule(state, 'correct', baseTime);

      expect(next.stability).toBeCloseTo(13, 10);
    });

    it('caps stability at the maximum interval', () => {
      const state = reviewedState({ repetitions: 5, stability: 300, difficulty: 0.3 });
      const next = scheduler.schedule(state, 'correct', baseTime);

      expect(next.stability).toBe(365);
    });

    it('keeps the previous due date when a non-lapse review lands early', () => {
      const laterDue = new Date(baseTime.getTime() + 30 * DAY_MS);
      const state = reviewedState({ repetitions: 1, stability: 2, nextDueAt: laterDue });
      const next = scheduler.schedule(state, 'correct', baseTime);

      expect(next.nextDueAt.getTime()).toBe(laterDue.getTime());
    });

    it('lets a lapse pull the due date earlier', () => {
      const laterDue = new Date(baseTime.getTime() + 30 * DAY_MS);
      const state = reviewedState({ nextDueAt: laterDue });
      const next = scheduler.schedule(state, 'incorrect', baseTime);

      expect(next.nextDueAt.getTime()).toBe(baseTime.getTime() + DAY_MS);
    });

    it('keeps the input version for the store to increment', () => {
      const next = scheduler.schedule(reviewedState({ version: 7 }), 'correct', baseTime);
      expect(next.version).toBe(7);
    });
  });

  describe('invariants', () => {
    it('always schedules strictly after the review time', () => {
      let state = scheduler.createInitialState('user_1', 'item_1', 2.5, baseTime);
      const outcomes = ['correct', 'incorrect', 'partial', 'correct', 'incorrect', 'correct'] as const;
      let now = baseTime;

      for (const outcome of outcomes) {
        state = scheduler.schedule(state, outcome, now);
        expect(state.nextDueAt.getTime()).toBeGreaterThan(now.getTime());
        now = new Date(now.getTime() + 6 * 60 * 60 * 1000);
      }
    });

    it('never decreases stability across a streak of correct answers', () => {
      let state = scheduler.createInitialState('user_1', 'item_1', 4.8, baseTime);
      let now = baseTime;
      let previous = state.stability;

      for (let i = 0; i < 12; i++) {
        state = scheduler.schedule(state, 'correct', now);
        expect(state.stability).toBeGreaterThanOrEqual(previous);
        previous = state.stability;
        now = state.nextDueAt;
      }
    });

    it('holds difficulty at the maximum after more lapses than the ceiling', () => {
      let state = reviewedState({ difficulty: 4.0 });

      for (let i = 0; i < 20; i++) {
        state = scheduler.schedule(state, 'incorrect', baseTime);
      }

      expect(state.difficulty).toBe(5.0);
      expect(state.lapses).toBe(20);
    });

    it('keeps counting lapses past the ceiling', () => {
      const state = scheduler.schedule(reviewedState({ lapses: 12 }), 'incorrect', baseTime);
      expect(state.lapses).toBe(13);
    });

    it('pins difficulty at the maximum once lapses reach the ceiling', () => {
      let state = reviewedState({ difficulty: 1.0, lapses: 6 });

      state = scheduler.schedule(state, 'incorrect', baseTime);
      expect(state.lapses).toBe(7);
      expect(state.difficulty).toBeCloseTo(1.3, 10);

      state = scheduler.schedule(state, 'incorrect', baseTime);
      expect(state.lapses).toBe(8);
      expect(state.difficulty).toBe(5.0);
    });

    it('holds difficulty at the minimum after a long correct streak', () => {
      let state = reviewedState({ difficulty: 1.0 });

      for (let i = 0; i < 20; i++) {
        state = scheduler.schedule(state, 'correct', baseTime);
      }

      expect(state.difficulty).toBe(0.3);
    });
  });

  describe('malformed input', () => {
    it('clamps NaN and negative fields instead of rejecting them', () => {
      const state = reviewedState({
        stability: NaN,
        difficulty: -4,
        repetitions: -2,
        lapses: -1,
      });
      const next = scheduler.schedule(state, 'correct', baseTime);

      // repetitions clamp to 0, so this counts as a first success
      expect(next.stability).toBe(1);
      expect(next.difficulty).toBe(0.3);
      expect(next.repetitions).toBe(1);
      expect(next.lapses).toBe(0);
    });

    it('falls back to the last review time when the clock is invalid', () => {
      const lastReviewedAt = new Date(baseTime.getTime() - DAY_MS);
      const state = reviewedState({ lastReviewedAt });
      const next = scheduler.schedule(state, 'incorrect', new Date('not a date'));

      expect(next.lastReviewedAt?.getTime()).toBe(lastReviewedAt.getTime());
      expect(next.nextDueAt.getTime()).toBe(lastReviewedAt.getTime() + DAY_MS);
    });

    it('never moves the review time before the previous review', () => {
      const lastReviewedAt = new Date(baseTime.getTime() + DAY_MS);
      const state = reviewedState({ lastReviewedAt });
      const next = scheduler.schedule(state, 'incorrect', baseTime);

      expect(next.lastReviewedAt?.getTime()).toBe(lastReviewedAt.getTime());
    });
  });

  describe('bounds enforcement', () => {
    it('throws under strict bounds when configuration produces an out-of-range value', () => {
      const strict = new ItemScheduler({ initialStabilityDays: 400, strictBounds: true });
      const initial = strict.createInitialState('user_1', 'item_1', 2.5, baseTime);

      expect(() => strict.schedule(initial, 'correct', baseTime)).toThrow(
        SchedulerBoundsViolationError
      );
    });

    it('clamps silently when strict bounds are off', () => {
      const lenient = new ItemScheduler({ initialStabilityDays: 400, strictBounds: false });
      const initial = lenient.createInitialState('user_1', 'item_1', 2.5, baseTime);

      expect(lenient.schedule(initial, 'correct', baseTime).stability).toBe(365);
    });
  });

  describe('isDue', () => {
    it('compares the due date against the given time', () => {
      const state = reviewedState({ nextDueAt: baseTime });

      expect(scheduler.isDue(state, baseTime)).toBe(true);
      expect(scheduler.isDue(state, new Date(baseTime.getTime() - 1))).toBe(false);
    });
  });
});

describe('RetentionEstimator', () => {
  const estimator = new RetentionEstimator();

  it('returns zero for an item that was never reviewed', () => {
    const scheduler = new ItemScheduler();
    const state = scheduler.createInitialState('user_1', 'item_1', 2.5, baseTime);

    expect(estimator.getRetrievability(state, baseTime)).toBe(0);
  });

  it('reaches the target retention one stability interval after the review', () => {
    const state = reviewedState({ stability: 1, lastReviewedAt: baseTime });
    const asOf = new Date(baseTime.getTime() + DAY_MS);

    expect(estimator.getRetrievability(state, asOf)).toBeCloseTo(0.9, 2);
  });

  it('decays as time passes', () => {
    const state = reviewedState({ stability: 1, lastReviewedAt: baseTime });
    const early = estimator.getRetrievability(state, new Date(baseTime.getTime() + DAY_MS));
    const late = estimator.getRetrievability(state, new Date(baseTime.getTime() + 10 * DAY_MS));

    expect(late).toBeLessThan(early);
  });

  it('averages across states and returns zero for none', () => {
    expect(estimator.meanRetrievability([], baseTime)).toBe(0);
  });
});
