/**
 * Effectiveness Signal
 *
 * Scores how well a learner is doing in one skill domain from a sliding
 * window of recent interactions. The score blends three observations:
 *
 *   0.7 * accuracy                  (partial answers count half)
 * + 0.2 * latency efficiency        (1 at instant answers, 0 at the baseline)
 * + 0.1 * (1 - hesitation rate)     (share of answers slower than the threshold)
 *
 * An empty window scores a neutral 0.5. The result is clamped to [0, 1].
 *
 * Windows are part of the SessionContext, and can be rebuilt from the
 * interaction event log with `replayWindows`.
 */

import type { InteractionSample, Outcome } from '../models';
import type { InteractionLogRecord } from '../ports';
import { DEFAULT_CONTROLLER_CONFIG, type ControllerConfig } from '../../config';

export const NEUTRAL_SIGNAL = 0.5;

const ACCURACY_WEIGHT = 0.7;
const LATENCY_WEIGHT = 0.2;
const COMPOSURE_WEIGHT = 0.1;

const OUTCOME_CREDIT: Record<Outcome, number> = {
  correct: 1,
  partial: 0.5,
  incorrect: 0,
};

export type SignalConfig = Pick<
  ControllerConfig,
  'windowCapacity' | 'latencyBaselineMs' | 'hesitationThresholdMs'
>;

/**
 * Breakdown of a signal, for logs and analytics.
 */
export interface SignalComponents {
  accuracy: number;
  latencyEfficiency: number;
  hesitationRate: number;
  signal: number;
}

export function computeSignalComponents(
  samples: InteractionSample[],
  config: SignalConfig = DEFAULT_CONTROLLER_CONFIG
): SignalComponents {
  if (samples.length === 0) {
    return { accuracy: 0, latencyEfficiency: 0, hesitationRate: 0, signal: NEUTRAL_SIGNAL };
  }

  const n = samples.length;
  const accuracy = samples.reduce((sum, s) => sum + OUTCOME_CREDIT[s.outcome], 0) / n;
  const meanLatency = samples.reduce((sum, s) => sum + s.latencyMs, 0) / n;
  const latencyEfficiency = Math.max(0, 1 - meanLatency / config.latencyBaselineMs);
  const hesitationRate =
    samples.filter((s) => s.latencyMs > config.hesitationThresholdMs).length / n;

  const raw =
    ACCURACY_WEIGHT * accuracy +
    LATENCY_WEIGHT * latencyEfficiency +
    COMPOSURE_WEIGHT * (1 - hesitationRate);

  return {
    accuracy,
    latencyEfficiency,
    hesitationRate,
    signal: Math.min(1, Math.max(0, raw)),
  };
}

export function computeSignal(
  samples: InteractionSample[],
  config: SignalConfig = DEFAULT_CONTROLLER_CONFIG
): number {
  return computeSignalComponents(samples, config).signal;
}

/**
 * Returns a new window with `sample` appended, trimmed to `capacity`.
 */
export function appendToWindow(
  window: InteractionSample[],
  sample: InteractionSample,
  capacity: number
): InteractionSample[] {
  const next = [...window, sample];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}

/**
 * Rebuilds per-domain windows and signals from an event log.
 *
 * @param records - Log records in apply order
 * @param domainsByItem - Skill domains of every item the log mentions;
 *   records for unknown items are skipped
 */
export function replayWindows(
  records: InteractionLogRecord[],
  domainsByItem: Map<string, string[]>,
  config: SignalConfig = DEFAULT_CONTROLLER_CONFIG
): { windows: Record<string, InteractionSample[]>; effectiveness: Record<string, number> } {
  const windows: Record<string, InteractionSample[]> = {};

  for (const { event } of records) {
    const domains = domainsByItem.get(event.itemId);
    if (!domains) {
      continue;
    }
    const sample: InteractionSample = {
      eventId: event.id,
      itemId: event.itemId,
      outcome: event.outcome,
      latencyMs: event.latencyMs,
      occurredAt: event.occurredAt,
    };
    for (const domain of domains) {
      windows[domain] = appendToWindow(windows[domain] ?? [], sample, config.windowCapacity);
    }
  }

  const effectiveness: Record<string, number> = {};
  for (const [domain, samples] of Object.entries(windows)) {
    effectiveness[domain] = computeSignal(samples, config);
  }

  return { windows, effectiveness };
}
