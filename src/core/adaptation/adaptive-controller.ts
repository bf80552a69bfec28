/**
 * Adaptive Controller - Per-Domain Feedback Loop
 *
 * Each skill domain in a session runs a small state machine driven by the
 * domain's effectiveness signal:
 *
 *   nominal ──(signal < low, window ≥ N)──────────▶ struggling
 *   struggling ──(signal ≥ low for N events)──────▶ nominal
 *   nominal ──(signal > high for N events)────────▶ accelerating
 *   accelerating ──(signal ≤ high)────────────────▶ nominal
 *
 * Entering struggling injects remediation: items the learner has lapsed on,
 * plus easier material from the Content Service. Entering accelerating
 * injects harder material. Injected entries are appended to the pending
 * queue; the pipeline re-sorts afterwards.
 *
 * If the Content Service fails or exceeds its time budget the controller
 * holds the queue as it is and reports a degraded hint. It never throws.
 */

import type {
  ControllerState,
  DomainControllerState,
  LearningItem,
  QueueEntry,
  ReviewState,
  SessionContext,
} from '../models';
import type { ContentService, DurableStore } from '../ports';
import { ContentServiceUnavailableError } from '../errors';
import { withTimeout } from '../async';
import { toQueueEntry } from '../session/queue';
import {
  DEFAULT_CONTROLLER_CONFIG,
  DEFAULT_SCHEDULER_CONFIG,
  type ControllerConfig,
  type SchedulerConfig,
} from '../../config';

export type AdaptationAction = 'remediate' | 'escalate' | 'hold';

/**
 * What the controller decided for one domain.
 */
export interface DomainAdaptation {
  domain: string;
  previousState: ControllerState;
  state: ControllerState;
  signal: number;
  action: AdaptationAction;
  injectedItemIds: string[];
  /** The Content Service could not be consulted; the queue was held */
  degraded: boolean;
}

/**
 * Combined hint returned with every interaction.
 */
export interface AdaptationHint {
  /** First non-hold action across the item's domains, else 'hold' */
  action: AdaptationAction;
  degraded: boolean;
  domains: DomainAdaptation[];
}

export interface AdaptiveControllerDependencies {
  content: ContentService;
  durable: DurableStore;
}

type DifficultyBounds = Pick<SchedulerConfig, 'minDifficulty' | 'maxDifficulty' | 'defaultDifficulty'>;

export function initialDomainState(): DomainControllerState {
  return { state: 'nominal', aboveHighStreak: 0, recoveryStreak: 0, transitions: 0 };
}

/**
 * Pure transition function. Returns the next domain state.
 */
export function nextDomainState(
  current: DomainControllerState,
  signal: number,
  windowLength: number,
  config: Pick<ControllerConfig, 'lowThreshold' | 'highThreshold' | 'windowSize'>
): DomainControllerState {
  const { lowThreshold, highThreshold, windowSize } = config;
  const transition = (state: ControllerState): DomainControllerState => ({
    state,
    aboveHighStreak: 0,
    recoveryStreak: 0,
    transitions: current.transitions + 1,
  });

  switch (current.state) {
    case 'nominal': {
      if (windowLength >= windowSize && signal < lowThreshold) {
        return transition('struggling');
      }
      const aboveHighStreak = signal > highThreshold ? current.aboveHighStreak + 1 : 0;
      if (aboveHighStreak >= windowSize) {
        return transition('accelerating');
      }
      return { ...current, aboveHighStreak, recoveryStreak: 0 };
    }
    case 'struggling': {
      const recoveryStreak = signal >= lowThreshold ? current.recoveryStreak + 1 : 0;
      if (recoveryStreak >= windowSize) {
        return transition('nominal');
      }
      return { ...current, recoveryStreak, aboveHighStreak: 0 };
    }
    case 'accelerating': {
      if (signal <= highThreshold) {
        return transition('nominal');
      }
      return current;
    }
  }
}

/**
 * Content lookups run under the controller's time budget; any failure is
 * reported as the Content Service being unavailable.
 */
async function fetchWithin<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  try {
    return await withTimeout(promise, ms, label);
  } catch (error) {
    throw new ContentServiceUnavailableError(`${label} failed`, error);
  }
}

/**
 * Drives the per-domain state machines and queue injections.
 *
 * @example
 * ```typescript
 * const controller = new AdaptiveController({ content, durable });
 * const hint = await controller.evaluate(workingCopy, ['greetings'], now);
 * if (hint.action === 'escalate') {
 *   // harder items were appended to workingCopy.queue
 * }
 * ```
 */
export class AdaptiveController {
  private readonly config: ControllerConfig;
  private readonly bounds: DifficultyBounds;

  constructor(
    private readonly deps: AdaptiveControllerDependencies,
    config: Partial<ControllerConfig> = {},
    bounds: Partial<DifficultyBounds> = {}
  ) {
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...config };
    this.bounds = {
      minDifficulty: bounds.minDifficulty ?? DEFAULT_SCHEDULER_CONFIG.minDifficulty,
      maxDifficulty: bounds.maxDifficulty ?? DEFAULT_SCHEDULER_CONFIG.maxDifficulty,
      defaultDifficulty: bounds.defaultDifficulty ?? DEFAULT_SCHEDULER_CONFIG.defaultDifficulty,
    };
  }

  getConfig(): Readonly<ControllerConfig> {
    return { ...this.config };
  }

  /**
   * Advances the state machine of each domain using the signals already in
   * `ctx.effectiveness`, and injects items on entry to struggling or
   * accelerating. Mutates `ctx` (a working copy owned by the caller).
   */
  async evaluate(ctx: SessionContext, domains: string[], now: Date): Promise<AdaptationHint> {
    const results: DomainAdaptation[] = [];

    for (const domain of domains) {
      const current = ctx.domainStates[domain] ?? initialDomainState();
      const signal = ctx.effectiveness[domain];
      const windowLength = ctx.windows[domain]?.length ?? 0;

      if (signal === undefined) {
        ctx.domainStates[domain] = current;
        continue;
      }

      const next = nextDomainState(current, signal, windowLength, this.config);
      ctx.domainStates[domain] = next;

      const adaptation: DomainAdaptation = {
        domain,
        previousState: current.state,
        state: next.state,
        signal,
        action: 'hold',
        injectedItemIds: [],
        degraded: false,
      };

      if (next.state !== current.state) {
        console.log(
          `[AdaptiveController] Session ${ctx.id} domain '${domain}': ${current.state} -> ${next.state} (signal ${signal.toFixed(3)})`
        );
        if (next.state === 'struggling' || next.state === 'accelerating') {
          await this.inject(ctx, domain, next.state, now, adaptation);
        }
      }

      results.push(adaptation);
    }

    const active = results.find((r) => r.action !== 'hold');
    return {
      action: active?.action ?? 'hold',
      degraded: results.some((r) => r.degraded),
      domains: results,
    };
  }

  /**
   * Mean base difficulty of the domain's queue entries; the default
   * difficulty when the queue has none.
   */
  referenceDifficulty(ctx: SessionContext, domain: string): number {
    const entries = ctx.queue.filter((e) => e.skillDomains.includes(domain));
    if (entries.length === 0) {
      return this.bounds.defaultDifficulty;
    }
    return entries.reduce((sum, e) => sum + e.baseDifficulty, 0) / entries.length;
  }

  private async inject(
    ctx: SessionContext,
    domain: string,
    state: 'struggling' | 'accelerating',
    now: Date,
    adaptation: DomainAdaptation
  ): Promise<void> {
    try {
      const entries =
        state === 'struggling'
          ? await this.remediationEntries(ctx, domain, now)
          : await this.escalationEntries(ctx, domain, now);

      ctx.queue.push(...entries);
      adaptation.action = state === 'struggling' ? 'remediate' : 'escalate';
      adaptation.injectedItemIds = entries.map((e) => e.itemId);
    } catch (error) {
      adaptation.degraded = true;
      console.warn(
        `[AdaptiveController] Holding queue for session ${ctx.id} domain '${domain}': content unavailable`,
        error instanceof Error ? error.message : error
      );
    }
  }

  private pendingIds(ctx: SessionContext): string[] {
    return ctx.queue.slice(ctx.cursor).map((e) => e.itemId);
  }

  /**
   * Lapsed items first (most lapses first), then easier material.
   */
  private async remediationEntries(
    ctx: SessionContext,
    domain: string,
    now: Date
  ): Promise<QueueEntry[]> {
    const { injectionBatchSize, difficultyBand, lapsedItemMinLapses, contentTimeoutMs } =
      this.config;
    const pending = new Set(this.pendingIds(ctx));

    const lapsedStates = (
      await fetchWithin(
        this.deps.durable.listLapsedReviewStates(ctx.userId, lapsedItemMinLapses),
        contentTimeoutMs,
        'Lapsed item lookup'
      )
    ).filter((s) => !pending.has(s.itemId));
    const statesById = new Map(lapsedStates.map((s) => [s.itemId, s]));

    const lapsedItems =
      lapsedStates.length === 0
        ? []
        : await fetchWithin(
            this.deps.content.getItems(lapsedStates.map((s) => s.itemId)),
            contentTimeoutMs,
            'Content lookup'
          );

    const lapsedEntries = lapsedItems
      .filter((item) => item.skillDomains.includes(domain))
      .sort((a, b) => (statesById.get(b.id)?.lapses ?? 0) - (statesById.get(a.id)?.lapses ?? 0))
      .slice(0, injectionBatchSize)
      .map((item) => toQueueEntry(item, 'remediation', now, statesById.get(item.id)));

    const reference = this.referenceDifficulty(ctx, domain);
    const exclude = new Set([...ctx.queue.map((e) => e.itemId), ...lapsedEntries.map((e) => e.itemId)]);
    const easier = await fetchWithin(
      this.deps.content.fetchItems({
        domain,
        difficultyRange: {
          min: this.bounds.minDifficulty,
          max: Math.max(this.bounds.minDifficulty, reference - difficultyBand),
        },
        excludeIds: [...exclude],
      }),
      contentTimeoutMs,
      'Remediation fetch'
    );

    const easierEntries = (await this.dueCandidates(ctx.userId, easier, exclude, now))
      .sort((a, b) => a.item.baseDifficulty - b.item.baseDifficulty || a.item.id.localeCompare(b.item.id))
      .slice(0, injectionBatchSize)
      .map(({ item, state }) => toQueueEntry(item, 'remediation', now, state));

    return [...lapsedEntries, ...easierEntries];
  }

  private async escalationEntries(
    ctx: SessionContext,
    domain: string,
    now: Date
  ): Promise<QueueEntry[]> {
    const { injectionBatchSize, difficultyBand, contentTimeoutMs } = this.config;
    const reference = this.referenceDifficulty(ctx, domain);
    const exclude = new Set(ctx.queue.map((e) => e.itemId));

    const harder = await fetchWithin(
      this.deps.content.fetchItems({
        domain,
        difficultyRange: {
          min: Math.min(this.bounds.maxDifficulty, reference + difficultyBand),
          max: this.bounds.maxDifficulty,
        },
        excludeIds: [...exclude],
      }),
      contentTimeoutMs,
      'Escalation fetch'
    );

    return (await this.dueCandidates(ctx.userId, harder, exclude, now))
      .sort((a, b) => a.item.baseDifficulty - b.item.baseDifficulty || a.item.id.localeCompare(b.item.id))
      .slice(0, injectionBatchSize)
      .map(({ item, state }) => toQueueEntry(item, 'escalation', now, state));
  }

  /**
   * Pairs fetched items with the user's review state and keeps the ones
   * that are new or already due. Injecting a not-yet-due item would review
   * it early and reset its interval.
   */
  private async dueCandidates(
    userId: string,
    items: LearningItem[],
    exclude: Set<string>,
    now: Date
  ): Promise<Array<{ item: LearningItem; state: ReviewState | null }>> {
    const candidates = items.filter((item) => !exclude.has(item.id));
    if (candidates.length === 0) {
      return [];
    }

    const states = await fetchWithin(
      this.deps.durable.listReviewStates(
        userId,
        candidates.map((item) => item.id)
      ),
      this.config.contentTimeoutMs,
      'Review state lookup'
    );
    const statesById = new Map(states.map((s) => [s.itemId, s]));

    return candidates
      .map((item) => ({ item, state: statesById.get(item.id) ?? null }))
      .filter(({ state }) => state === null || state.nextDueAt.getTime() <= now.getTime());
  }
}
