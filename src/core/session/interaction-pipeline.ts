/**
 * Interaction Pipeline - Applying One Answer to a Session
 *
 * Takes a session (as read under its lock) and an InteractionEvent and
 * produces the next session state:
 *
 * 1. Validate the event against the session (see InvalidEventReason)
 * 2. Bring the answered item to the cursor, fetching it first if this is an
 *    extra-curricular review
 * 3. Schedule the item and persist its ReviewState by compare-and-swap
 * 4. Slide the sample into each of the item's domain windows and recompute
 *    the domain signals
 * 5. Let the Adaptive Controller react (it may inject entries)
 * 6. Advance the cursor and re-sort the pending entries
 * 7. Store the new state, queue the event-log append and publish analytics
 *
 * All work happens on a private copy; if any step throws, the stored
 * session is left exactly as it was. A ReviewState written in step 3 before
 * a later failure is harmless: the retried event reschedules from it.
 */

import type {
  InteractionEvent,
  QueueEntry,
  ReviewState,
  SessionContext,
} from '../models';
import type { AnalyticsSink, AnalyticsRecord, ContentService, DurableStore } from '../ports';
import {
  ContentServiceUnavailableError,
  InvalidEventError,
  StoreUnavailableError,
} from '../errors';
import type { ItemScheduler } from '../scheduler';
import {
  appendToWindow,
  computeSignal,
  type AdaptationHint,
  type AdaptiveController,
} from '../adaptation';
import type { SessionStateStore } from '../state';
import { sleep, withTimeout } from '../async';
import { sortPending, toQueueEntry } from './queue';
import type { PipelineOutcome } from './types';
import {
  DEFAULT_CONTROLLER_CONFIG,
  DEFAULT_SESSION_CONFIG,
  DEFAULT_STORE_CONFIG,
  type ControllerConfig,
  type SessionConfig,
  type StoreConfig,
} from '../../config';

const OUTCOMES = new Set(['correct', 'incorrect', 'partial']);

export interface InteractionPipelineDependencies {
  store: SessionStateStore;
  durable: DurableStore;
  content: ContentService;
  analytics: AnalyticsSink;
  scheduler: ItemScheduler;
  controller: AdaptiveController;
  now?: () => Date;
}

export interface InteractionPipelineConfig {
  controller?: Partial<ControllerConfig>;
  session?: Partial<SessionConfig>;
  store?: Partial<StoreConfig>;
}

export class InteractionPipeline {
  private readonly controllerConfig: ControllerConfig;
  private readonly sessionConfig: SessionConfig;
  private readonly storeConfig: StoreConfig;
  private readonly now: () => Date;

  constructor(
    private readonly deps: InteractionPipelineDependencies,
    config: InteractionPipelineConfig = {}
  ) {
    this.controllerConfig = { ...DEFAULT_CONTROLLER_CONFIG, ...config.controller };
    this.sessionConfig = { ...DEFAULT_SESSION_CONFIG, ...config.session };
    this.storeConfig = { ...DEFAULT_STORE_CONFIG, ...config.store };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Applies `event` to `ctx`. The caller must hold the session's lock.
   *
   * @throws {InvalidEventError} The event cannot be applied; nothing changed
   * @throws {StoreUnavailableError} The ReviewState could not be persisted
   * @throws {ContentServiceUnavailableError} An extra-curricular item could
   *   not be looked up
   */
  async handle(ctx: SessionContext, event: InteractionEvent): Promise<PipelineOutcome> {
    const now = this.now();
    const working = structuredClone(ctx);

    this.validate(working, event);
    const entry = await this.bringToCursor(working, event, now);

    const reviewState = await this.persistReviewState(working.userId, entry, event, now);

    for (const domain of entry.skillDomains) {
      const window = appendToWindow(
        working.windows[domain] ?? [],
        {
          eventId: event.id,
          itemId: event.itemId,
          outcome: event.outcome,
          latencyMs: event.latencyMs,
          occurredAt: event.occurredAt,
        },
        this.controllerConfig.windowCapacity
      );
      working.windows[domain] = window;
      working.effectiveness[domain] = computeSignal(window, this.controllerConfig);
    }

    const adaptation = await this.deps.controller.evaluate(working, entry.skillDomains, now);

    const appliedAt = working.cursor;
    working.queue[appliedAt] = {
      ...entry,
      nextDueAt: reviewState.nextDueAt,
      stability: reviewState.stability,
    };
    working.cursor = appliedAt + 1;
    working.queue = sortPending(working.queue, working.cursor, now);

    working.interactionCount += 1;
    working.outcomeCounts[event.outcome] += 1;
    working.totalLatencyMs += event.latencyMs;
    working.recentOutcomes = [...working.recentOutcomes, event.outcome].slice(
      -this.sessionConfig.masteryWindow
    );
    working.appliedEventIds = [...working.appliedEventIds, event.id].slice(
      -this.sessionConfig.appliedEventMemory
    );
    working.updatedAt = now;

    this.deps.store.put(working.id, working);
    this.deps.store.enqueueEventAppend(working.id, {
      event: { ...event, cursor: appliedAt },
      userId: working.userId,
      sequence: working.interactionCount,
    });

    this.publishAnalytics(working, event, entry, reviewState, adaptation, now);

    return {
      context: working,
      result: {
        nextItem: working.queue[working.cursor] ?? null,
        adaptation,
        reviewState,
      },
    };
  }

  private validate(ctx: SessionContext, event: InteractionEvent): void {
    if (
      !OUTCOMES.has(event.outcome) ||
      !Number.isFinite(event.latencyMs) ||
      event.latencyMs < 0 ||
      isNaN(event.occurredAt.getTime())
    ) {
      throw new InvalidEventError('malformed_event', `Event '${event.id}' is malformed`, {
        eventId: event.id,
      });
    }

    if (event.sessionId !== ctx.id) {
      throw new InvalidEventError(
        'session_mismatch',
        `Event '${event.id}' belongs to session '${event.sessionId}', not '${ctx.id}'`
      );
    }

    if (ctx.status !== 'active') {
      throw new InvalidEventError(
        'session_not_active',
        `Session '${ctx.id}' is ${ctx.status} and does not accept interactions`,
        { status: ctx.status }
      );
    }

    if (ctx.appliedEventIds.includes(event.id)) {
      throw new InvalidEventError('duplicate_event', `Event '${event.id}' was already applied`, {
        eventId: event.id,
      });
    }

    if (event.cursor !== undefined && event.cursor < ctx.cursor) {
      throw new InvalidEventError(
        'superseded_cursor',
        `Event '${event.id}' was sent at cursor ${event.cursor}; the session is at ${ctx.cursor}`,
        { eventCursor: event.cursor, cursor: ctx.cursor }
      );
    }
  }

  /**
   * Moves the answered entry to the cursor position and returns it.
   */
  private async bringToCursor(
    ctx: SessionContext,
    event: InteractionEvent,
    now: Date
  ): Promise<QueueEntry> {
    const pendingIndex = ctx.queue.findIndex(
      (e, i) => i >= ctx.cursor && e.itemId === event.itemId
    );

    if (pendingIndex >= 0) {
      const [entry] = ctx.queue.splice(pendingIndex, 1);
      ctx.queue.splice(ctx.cursor, 0, entry);
      return entry;
    }

    const extraCurricular = event.extraCurricular === true || ctx.allowExtraCurricular;
    if (!extraCurricular) {
      const answered = ctx.queue.some((e, i) => i < ctx.cursor && e.itemId === event.itemId);
      throw answered
        ? new InvalidEventError(
            'item_already_answered',
            `Item '${event.itemId}' was already answered in this session`,
            { itemId: event.itemId }
          )
        : new InvalidEventError(
            'item_not_in_queue',
            `Item '${event.itemId}' is not in the session queue`,
            { itemId: event.itemId }
          );
    }

    const [item] = await withTimeout(
      this.deps.content.getItems([event.itemId]),
      this.controllerConfig.contentTimeoutMs,
      'Extra-curricular item lookup'
    ).catch((error: unknown) => {
      throw new ContentServiceUnavailableError(
        `Could not look up extra-curricular item '${event.itemId}'`,
        error
      );
    });

    if (!item) {
      throw new InvalidEventError('item_unknown', `Item '${event.itemId}' does not exist`, {
        itemId: event.itemId,
      });
    }

    const entry = toQueueEntry(item, 'extra_curricular', now);
    ctx.queue.splice(ctx.cursor, 0, entry);
    return entry;
  }

  /**
   * Schedules the item and writes the result with compare-and-swap. A lost
   * race reloads the winner's state and schedules again from it; a failing
   * store is retried with backoff.
   */
  private async persistReviewState(
    userId: string,
    entry: QueueEntry,
    event: InteractionEvent,
    now: Date
  ): Promise<ReviewState> {
    const { maxCasAttempts } = this.sessionConfig;
    let current: ReviewState | null = null;
    let loaded = false;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxCasAttempts; attempt++) {
      try {
        if (!loaded) {
          current = await this.deps.durable.getReviewState(userId, entry.itemId);
          loaded = true;
        }
        const base =
          current ??
          this.deps.scheduler.createInitialState(userId, entry.itemId, entry.baseDifficulty, now);
        const next = this.deps.scheduler.schedule(base, event.outcome, now);
        const result = await this.deps.durable.compareAndSwapReviewState(next, base.version);

        if (result.ok) {
          return result.state;
        }
        console.warn(
          `[InteractionPipeline] Review state for ${userId}/${entry.itemId} changed concurrently; rescheduling`
        );
        current = result.current;
      } catch (error) {
        lastError = error;
        if (attempt < maxCasAttempts - 1) {
          await sleep(this.storeConfig.retryBaseDelayMs * Math.pow(2, attempt));
        }
      }
    }

    throw new StoreUnavailableError(
      `Could not persist review state for ${userId}/${entry.itemId} after ${maxCasAttempts} attempts`,
      lastError
    );
  }

  private publishAnalytics(
    ctx: SessionContext,
    event: InteractionEvent,
    entry: QueueEntry,
    reviewState: ReviewState,
    adaptation: AdaptationHint,
    now: Date
  ): void {
    const base = { sessionId: ctx.id, userId: ctx.userId, timestamp: now };
    const signals: Record<string, number> = {};
    for (const domain of entry.skillDomains) {
      signals[domain] = ctx.effectiveness[domain];
    }

    const records: AnalyticsRecord[] = [
      { ...base, type: 'interaction', event, signals, nextDueAt: reviewState.nextDueAt },
    ];
    for (const domain of adaptation.domains) {
      if (domain.previousState !== domain.state) {
        records.push({
          ...base,
          type: 'adaptation',
          domain: domain.domain,
          from: domain.previousState,
          to: domain.state,
          signal: domain.signal,
          injectedItemIds: domain.injectedItemIds,
          degraded: domain.degraded,
        });
      }
    }

    for (const record of records) {
      this.deps.analytics.publish(record).catch((error: unknown) => {
        console.error(`[InteractionPipeline] Analytics publish failed (${record.type}):`, error);
      });
    }
  }
}
