/**
 * ReviewState Domain Types
 *
 * One ReviewState exists per (user, item) pair. It is created on the first
 * exposure to an item, mutated only by the Item Scheduler and never
 * deleted. The `version` field backs compare-and-swap writes in the
 * Durable Store so that two sessions of the same learner cannot silently
 * overwrite each other's scheduling.
 */

/**
 * Result of a single review.
 *
 * - 'correct': full recall
 * - 'partial': recalled with errors; grows the interval but keeps difficulty
 * - 'incorrect': a lapse; resets the interval
 */
export type Outcome = 'correct' | 'incorrect' | 'partial';

/**
 * Per-learner scheduling state for one item.
 */
export interface ReviewState {
  userId: string;
  itemId: string;

  /** Consecutive successful reviews since the last lapse */
  repetitions: number;

  /** Total number of reviews ever applied */
  reviewCount: number;

  /** Days until recall probability is expected to decay to the review point */
  stability: number;

  /** Difficulty factor, kept inside the configured bounds */
  difficulty: number;

  /** Null until the first review */
  lastReviewedAt: Date | null;

  nextDueAt: Date;

  /** Incorrect outcomes so far; unbounded */
  lapses: number;

  /** Monotonic write version; 0 means never persisted */
  version: number;
}
