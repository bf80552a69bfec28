/**
 * Retention Estimation
 *
 * Estimates how likely a learner is to recall an item right now, using the
 * FSRS forgetting curve from ts-fsrs. The Item Scheduler owns the interval
 * arithmetic; this module only reads a ReviewState and projects it onto the
 * curve, for session summaries and for ranking remediation candidates.
 *
 * @see https://github.com/open-spaced-repetition/ts-fsrs for the curve itself
 */

import { FSRS, State, generatorParameters, type Card } from 'ts-fsrs';
import type { ReviewState } from '../models';
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from '../../config';

/** FSRS difficulty scale */
const FSRS_MIN_DIFFICULTY = 1;
const FSRS_MAX_DIFFICULTY = 10;

/**
 * Maps our review counters onto the FSRS learning states.
 */
function toFSRSState(state: ReviewState): State {
  if (state.reviewCount === 0 || state.lastReviewedAt === null) {
    return State.New;
  }
  if (state.repetitions === 0 && state.lapses > 0) {
    return State.Relearning;
  }
  return State.Review;
}

export class RetentionEstimator {
  private readonly fsrs: FSRS;
  private readonly config: SchedulerConfig;

  constructor(config: Partial<SchedulerConfig> = {}, requestRetention: number = 0.9) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.fsrs = new FSRS(
      generatorParameters({
        maximum_interval: this.config.maximumStabilityDays,
        request_retention: requestRetention,
      })
    );
  }

  /**
   * Probability of recall at `asOf`, in [0, 1]. Never-reviewed items are 0.
   */
  getRetrievability(state: ReviewState, asOf: Date = new Date()): number {
    if (toFSRSState(state) === State.New) {
      return 0;
    }
    return this.fsrs.get_retrievability(this.toCard(state), asOf, false);
  }

  /**
   * Mean retrievability across states; 0 for an empty list.
   */
  meanRetrievability(states: ReviewState[], asOf: Date = new Date()): number {
    if (states.length === 0) {
      return 0;
    }
    const total = states.reduce((sum, state) => sum + this.getRetrievability(state, asOf), 0);
    return total / states.length;
  }

  private toCard(state: ReviewState): Card {
    const { minDifficulty, maxDifficulty } = this.config;
    const span = maxDifficulty - minDifficulty;
    const normalized = span > 0 ? (state.difficulty - minDifficulty) / span : 0;

    return {
      due: state.nextDueAt,
      stability: state.stability,
      difficulty: FSRS_MIN_DIFFICULTY + normalized * (FSRS_MAX_DIFFICULTY - FSRS_MIN_DIFFICULTY),
      // ts-fsrs derives elapsed time from last_review when reading the curve
      elapsed_days: 0,
      scheduled_days: 0,
      reps: state.reviewCount,
      lapses: state.lapses,
      state: toFSRSState(state),
      last_review: state.lastReviewedAt ?? undefined,
    };
  }
}
