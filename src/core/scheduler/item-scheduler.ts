/**
 * Item Scheduler - SM-2 Family Spaced Repetition
 *
 * Computes the next ReviewState for an item from its current state and the
 * outcome of a review. The scheduler is a pure function of its inputs: it
 * never reads the clock and never touches storage, which keeps it trivially
 * testable and safe to call again when a compare-and-swap write has to be
 * retried.
 *
 * Model:
 * - Stability is the interval (in days) after which recall is expected to
 *   have decayed to the review point. A successful review multiplies it by
 *   a growth factor that shrinks as the item gets harder.
 * - Difficulty is a bounded factor. Lapses push it up; clean recalls pull
 *   it down; partial recalls leave it alone.
 * - A lapse resets stability to the floor and repetitions to zero. The
 *   lapse counter is unbounded; a lapse that takes it to `lapseCeiling`
 *   or beyond sets difficulty straight to the maximum.
 *
 * The function is total. Malformed input (NaN, negative counters, an
 * invalid clock) is clamped into range rather than rejected.
 */

import type { Outcome, ReviewState } from '../models';
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from '../../config';
import { SchedulerBoundsViolationError } from '../errors';

export const DAY_MS = 24 * 60 * 60 * 1000;

function isValidDate(value: Date | null | undefined): value is Date {
  return value instanceof Date && !isNaN(value.getTime());
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function toNonNegativeInt(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/**
 * Pure scheduler for per-learner review states.
 *
 * @example
 * ```typescript
 * const scheduler = new ItemScheduler();
 * const state = scheduler.createInitialState('user_1', 'item_hello', 2.5, now);
 * const next = scheduler.schedule(state, 'correct', now);
 * // next.stability === 1, next.nextDueAt is one day after now
 * ```
 */
export class ItemScheduler {
  private readonly config: SchedulerConfig;

  constructor(config: Partial<SchedulerConfig> = {}) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
  }

  getConfig(): Readonly<SchedulerConfig> {
    return { ...this.config };
  }

  /**
   * Builds the state for an item the learner has never seen. The item is
   * due immediately and starts at its authored difficulty.
   */
  createInitialState(
    userId: string,
    itemId: string,
    baseDifficulty: number,
    now: Date
  ): ReviewState {
    return {
      userId,
      itemId,
      repetitions: 0,
      reviewCount: 0,
      stability: 0,
      difficulty: this.clampDifficulty(baseDifficulty),
      lastReviewedAt: null,
      nextDueAt: isValidDate(now) ? new Date(now.getTime()) : new Date(0),
      lapses: 0,
      version: 0,
    };
  }

  /**
   * Applies one review outcome.
   *
   * The returned state keeps the input's `version`; the durable store
   * increments it when the write lands.
   */
  schedule(current: ReviewState, outcome: Outcome, now: Date): ReviewState {
    const state = this.sanitize(current);
    const reviewedAt = this.resolveReviewTime(state, now);
    const { initialStabilityDays, stabilityFloorDays, maximumStabilityDays } = this.config;

    let repetitions: number;
    let stability: number;
    let difficulty: number;
    let lapses = state.lapses;

    if (outcome === 'incorrect') {
      repetitions = 0;
      stability = stabilityFloorDays;
      lapses += 1;
      // Items that keep lapsing are pinned at the hardest setting
      difficulty =
        lapses >= this.config.lapseCeiling
          ? this.config.maxDifficulty
          : this.clampDifficulty(state.difficulty + this.config.difficultyStepUp);
    } else {
      stability =
        state.repetitions === 0
          ? initialStabilityDays
          : Math.min(
              maximumStabilityDays,
              Math.max(state.stability * this.growthFactor(state.difficulty), initialStabilityDays)
            );
      repetitions = state.repetitions + 1;
      difficulty =
        outcome === 'correct'
          ? this.clampDifficulty(state.difficulty - this.config.difficultyStepDown)
          : state.difficulty;
    }

    stability = this.enforceBounds(
      'stability',
      stability,
      Math.min(stabilityFloorDays, initialStabilityDays),
      maximumStabilityDays
    );
    difficulty = this.enforceBounds(
      'difficulty',
      difficulty,
      this.config.minDifficulty,
      this.config.maxDifficulty
    );

    let nextDueMs = reviewedAt.getTime() + stability * DAY_MS;
    // Only a lapse may pull the due date earlier
    if (outcome !== 'incorrect' && state.reviewCount > 0) {
      nextDueMs = Math.max(nextDueMs, state.nextDueAt.getTime());
    }

    return {
      userId: state.userId,
      itemId: state.itemId,
      repetitions,
      reviewCount: state.reviewCount + 1,
      stability,
      difficulty,
      lastReviewedAt: reviewedAt,
      nextDueAt: new Date(nextDueMs),
      lapses,
      version: state.version,
    };
  }

  /**
   * Whether the item should be reviewed at or before `asOf`.
   */
  isDue(state: ReviewState, asOf: Date = new Date()): boolean {
    return state.nextDueAt.getTime() <= asOf.getTime();
  }

  /**
   * Stability multiplier for a successful review at the given difficulty.
   * Harder items grow more slowly; the floor keeps every success moving the
   * interval forward.
   */
  growthFactor(difficulty: number): number {
    const { maxDifficulty, growthPerDifficulty, minGrowthFactor } = this.config;
    return Math.max(minGrowthFactor, 1 + (maxDifficulty - difficulty) * growthPerDifficulty);
  }

  clampDifficulty(difficulty: number): number {
    if (!Number.isFinite(difficulty)) {
      return clamp(this.config.defaultDifficulty, this.config.minDifficulty, this.config.maxDifficulty);
    }
    return clamp(difficulty, this.config.minDifficulty, this.config.maxDifficulty);
  }

  private sanitize(state: ReviewState): ReviewState {
    const stability = Number.isFinite(state.stability) && state.stability > 0 ? state.stability : 0;

    return {
      ...state,
      repetitions: toNonNegativeInt(state.repetitions),
      reviewCount: toNonNegativeInt(state.reviewCount),
      stability: Math.min(stability, this.config.maximumStabilityDays),
      difficulty: this.clampDifficulty(state.difficulty),
      lapses: toNonNegativeInt(state.lapses),
      lastReviewedAt: isValidDate(state.lastReviewedAt) ? state.lastReviewedAt : null,
      nextDueAt: isValidDate(state.nextDueAt) ? state.nextDueAt : new Date(0),
      version: toNonNegativeInt(state.version),
    };
  }

  /**
   * An invalid clock falls back to the last known review time. A clock
   * earlier than the last review is moved up to it so review times never
   * run backwards.
   */
  private resolveReviewTime(state: ReviewState, now: Date): Date {
    const lastMs = state.lastReviewedAt?.getTime() ?? 0;
    if (!isValidDate(now)) {
      return new Date(lastMs);
    }
    return new Date(Math.max(now.getTime(), lastMs));
  }

  private enforceBounds(field: string, value: number, min: number, max: number): number {
    if (Number.isFinite(value) && value >= min && value <= max) {
      return value;
    }
    if (this.config.strictBounds) {
      throw new SchedulerBoundsViolationError(field, value, min, max);
    }
    return Number.isFinite(value) ? clamp(value, min, max) : min;
  }
}
