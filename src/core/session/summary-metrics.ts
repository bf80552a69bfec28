/**
 * Session Summary Metrics
 *
 * Learning-effectiveness figures reported when a session is summarized.
 * All rates are per hour of session time; a session with no elapsed time
 * reports 0 rather than dividing by zero.
 */

import type { Outcome, QueueEntry } from '../models';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Partial answers count half, as in the summary accuracy.
 */
export function rollingAccuracy(outcomes: Outcome[]): number {
  if (outcomes.length === 0) {
    return 0;
  }
  const score = outcomes.reduce(
    (sum, outcome) => sum + (outcome === 'correct' ? 1 : outcome === 'partial' ? 0.5 : 0),
    0
  );
  return score / outcomes.length;
}

export function learningVelocity(correct: number, durationMs: number): number {
  return durationMs > 0 ? correct / (durationMs / HOUR_MS) : 0;
}

/**
 * Change in base difficulty from the first answered entry to the last,
 * per hour. Needs two answered entries.
 */
export function difficultyProgression(answered: QueueEntry[], durationMs: number): number {
  if (answered.length < 2 || durationMs <= 0) {
    return 0;
  }
  const first = answered[0].baseDifficulty;
  const last = answered[answered.length - 1].baseDifficulty;
  return (last - first) / (durationMs / HOUR_MS);
}

/**
 * Linear projection of the time left until the rolling accuracy reaches
 * `threshold`, assuming accuracy keeps growing at the rate it reached over
 * `elapsedMs`.
 *
 * @returns 0 once the threshold is met; null with no outcomes, a single
 *   outcome, no elapsed time or zero accuracy
 */
export function estimateMasteryMs(
  outcomes: Outcome[],
  elapsedMs: number,
  threshold: number
): number | null {
  if (outcomes.length === 0) {
    return null;
  }
  const accuracy = rollingAccuracy(outcomes);
  if (accuracy >= threshold) {
    return 0;
  }
  if (outcomes.length < 2 || elapsedMs <= 0 || accuracy === 0) {
    return null;
  }
  return ((threshold - accuracy) / accuracy) * elapsedMs;
}
