/**
 * Session Orchestrator - Public Contract of the Engine
 *
 * Owns the session lifecycle and is the only component callers talk to:
 *
 * ```
 *   startSession ──▶ active ──pauseSession──▶ paused ──resumeSession──▶ active
 *                      │                                                  │
 *                      ├──(shutdown: stop())──────────▶ interrupted ──────┘
 *                      │
 *                      └──endSession──▶ completed (flushed synchronously)
 * ```
 *
 * An idle timeout is not a lifecycle change: the sweep flushes and evicts
 * the session, and the next operation reads it back exactly as it was.
 *
 * Every operation on an existing session runs under that session's lock in
 * the Session State Store, so interactions for one session are applied one
 * at a time in receipt order while different sessions proceed in parallel.
 * Pause is cooperative: it queues behind any interaction already in flight.
 *
 * Durable writes happen behind the request path, except in `endSession`,
 * which flushes before it returns.
 *
 * @example
 * ```typescript
 * const orchestrator = new SessionOrchestrator({ store, durable, content, analytics });
 *
 * const session = await orchestrator.startSession('user_1', ['greetings']);
 * const first = session.queue[session.cursor];
 *
 * const response = await orchestrator.interact(session.id, {
 *   id: 'evt_1',
 *   sessionId: session.id,
 *   itemId: first.itemId,
 *   outcome: 'correct',
 *   latencyMs: 2100,
 *   occurredAt: new Date(),
 *   cursor: session.cursor,
 * });
 *
 * const summary = await orchestrator.endSession(session.id);
 * ```
 */

import type { InteractionEvent, LearningItem, ReviewState, SessionContext } from '../models';
import type {
  AnalyticsRecord,
  AnalyticsSink,
  ContentService,
  DurableStore,
  InteractionLogRecord,
  TutoringService,
} from '../ports';
import {
  ContentServiceUnavailableError,
  InvalidRequestError,
  SessionNotFoundError,
  StoreUnavailableError,
} from '../errors';
import { ItemScheduler, RetentionEstimator, DAY_MS } from '../scheduler';
import { AdaptiveController, replayWindows, initialDomainState } from '../adaptation';
import type { SessionStateStore } from '../state';
import { withTimeout } from '../async';
import { InteractionPipeline } from './interaction-pipeline';
import { sortPending, toLearningItem, toQueueEntry } from './queue';
import { difficultyProgression, estimateMasteryMs, learningVelocity } from './summary-metrics';
import type {
  DomainSummary,
  InteractResponse,
  PipelineOutcome,
  SessionSummary,
  StartSessionOptions,
} from './types';
import {
  DEFAULT_CONTROLLER_CONFIG,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_SESSION_CONFIG,
  type ControllerConfig,
  type SchedulerConfig,
  type SessionConfig,
  type StoreConfig,
} from '../../config';

/**
 * Generates a unique ID with a prefix, e.g. 'sess_3f2c...'.
 */
function generateId(prefix: string): string {
  return `${prefix}_${crypto.randomUUID()}`;
}

export interface SessionOrchestratorDependencies {
  store: SessionStateStore;
  durable: DurableStore;
  content: ContentService;
  analytics: AnalyticsSink;
  scheduler?: ItemScheduler;
  controller?: AdaptiveController;
  /** Optional; without one responses carry no tutorPrompt */
  tutor?: TutoringService;
  retention?: RetentionEstimator;
  now?: () => Date;
}

export interface SessionOrchestratorConfig {
  scheduler?: Partial<SchedulerConfig>;
  controller?: Partial<ControllerConfig>;
  session?: Partial<SessionConfig>;
  store?: Partial<StoreConfig>;
}

export class SessionOrchestrator {
  private readonly store: SessionStateStore;
  private readonly durable: DurableStore;
  private readonly content: ContentService;
  private readonly analytics: AnalyticsSink;
  private readonly tutor: TutoringService | undefined;
  private readonly retention: RetentionEstimator;
  private readonly pipeline: InteractionPipeline;
  private readonly now: () => Date;

  private readonly schedulerConfig: SchedulerConfig;
  private readonly controllerConfig: ControllerConfig;
  private readonly sessionConfig: SessionConfig;

  private maintenanceTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: SessionOrchestratorDependencies, config: SessionOrchestratorConfig = {}) {
    this.store = deps.store;
    this.durable = deps.durable;
    this.content = deps.content;
    this.analytics = deps.analytics;
    this.tutor = deps.tutor;
    this.now = deps.now ?? (() => new Date());

    this.schedulerConfig = { ...DEFAULT_SCHEDULER_CONFIG, ...config.scheduler };
    this.controllerConfig = { ...DEFAULT_CONTROLLER_CONFIG, ...config.controller };
    this.sessionConfig = { ...DEFAULT_SESSION_CONFIG, ...config.session };

    const scheduler = deps.scheduler ?? new ItemScheduler(this.schedulerConfig);
    const controller =
      deps.controller ??
      new AdaptiveController(
        { content: deps.content, durable: deps.durable },
        this.controllerConfig,
        this.schedulerConfig
      );
    this.retention = deps.retention ?? new RetentionEstimator(this.schedulerConfig);

    this.pipeline = new InteractionPipeline(
      {
        store: deps.store,
        durable: deps.durable,
        content: deps.content,
        analytics: deps.analytics,
        scheduler,
        controller,
        now: this.now,
      },
      { controller: this.controllerConfig, session: this.sessionConfig, store: config.store }
    );
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Starts a session over every item due in the requested domains. Items the
   * learner has never seen count as due. The queue may be empty.
   *
   * @throws {InvalidRequestError} No user or no skill domains given
   * @throws {ContentServiceUnavailableError} The catalog could not be read
   * @throws {StoreUnavailableError} Review states could not be read
   */
  async startSession(
    userId: string,
    skillDomains: string[],
    options: StartSessionOptions = {}
  ): Promise<SessionContext> {
    const domains = [...new Set(skillDomains.map((d) => d.trim()).filter((d) => d.length > 0))];
    if (userId.trim().length === 0) {
      throw new InvalidRequestError('A user ID is required to start a session');
    }
    if (domains.length === 0) {
      throw new InvalidRequestError('At least one skill domain is required', { skillDomains });
    }

    const now = this.now();
    const items = await this.fetchCatalog(domains);

    let states: ReviewState[];
    try {
      states = await this.durable.listReviewStates(
        userId,
        items.map((item) => item.id)
      );
    } catch (error) {
      throw new StoreUnavailableError(`Could not read review states for user '${userId}'`, error);
    }
    const statesById = new Map(states.map((s) => [s.itemId, s]));

    const dueEntries = items
      .map((item) => ({ item, state: statesById.get(item.id) }))
      .filter(({ state }) => !state || state.nextDueAt.getTime() <= now.getTime())
      .map(({ item, state }) => toQueueEntry(item, 'due', now, state));

    const maxItems = options.maxItems ?? this.sessionConfig.maxSessionSize;
    const queue = sortPending(dueEntries, 0, now).slice(0, maxItems);

    const domainStates: SessionContext['domainStates'] = {};
    for (const domain of domains) {
      domainStates[domain] = initialDomainState();
    }

    const ctx: SessionContext = {
      id: generateId('sess'),
      userId,
      skillDomains: domains,
      status: 'active',
      queue,
      cursor: 0,
      interactionCount: 0,
      effectiveness: {},
      domainStates,
      windows: {},
      appliedEventIds: [],
      outcomeCounts: { correct: 0, incorrect: 0, partial: 0 },
      totalLatencyMs: 0,
      recentOutcomes: [],
      allowExtraCurricular: options.allowExtraCurricular ?? false,
      degraded: false,
      startedAt: now,
      updatedAt: now,
      pausedAt: null,
      resumedAt: null,
      endedAt: null,
    };

    this.store.put(ctx.id, ctx);
    console.log(
      `[SessionOrchestrator] Started session ${ctx.id} for ${userId} with ${queue.length} items in [${domains.join(', ')}]`
    );

    this.publish({
      type: 'session_started',
      sessionId: ctx.id,
      userId,
      timestamp: now,
      skillDomains: domains,
      queueLength: queue.length,
    });

    return structuredClone(ctx);
  }

  /**
   * Applies one interaction and returns the next recommended item.
   *
   * While the session is degraded (the durable tier refused writes) the
   * orchestrator first tries to flush; if that still fails the event is not
   * applied and the response says so.
   *
   * @throws {SessionNotFoundError} Neither tier knows the session
   * @throws {InvalidEventError} The event was rejected; nothing changed
   */
  async interact(sessionId: string, event: InteractionEvent): Promise<InteractResponse> {
    return this.store.withSession(sessionId, async () => {
      const ctx = await this.requireSession(sessionId);

      if (ctx.degraded && !(await this.tryRecover(sessionId))) {
        return this.degradedResponse(ctx);
      }

      let outcome: PipelineOutcome;
      try {
        outcome = await this.pipeline.handle(ctx, event);
      } catch (error) {
        if (error instanceof StoreUnavailableError) {
          console.warn(
            `[SessionOrchestrator] Durable store unavailable for session ${sessionId}: ${error.message}`
          );
          this.store.markSessionDegraded(sessionId);
          return this.degradedResponse(ctx);
        }
        throw error;
      }

      const { context, result } = outcome;
      const response: InteractResponse = {
        sessionId,
        applied: true,
        degraded: this.store.isDegraded(sessionId),
        nextItem: result.nextItem,
        adaptation: result.adaptation,
        reviewState: result.reviewState,
        cursor: context.cursor,
        remaining: context.queue.length - context.cursor,
      };

      if (result.nextItem) {
        const tutorPrompt = await this.composeTutorPrompt(
          context,
          toLearningItem(result.nextItem),
          event.outcome
        );
        if (tutorPrompt !== undefined) {
          response.tutorPrompt = tutorPrompt;
        }
      }

      return response;
    });
  }

  /**
   * Stops accepting interactions until the session is resumed. Waits for
   * any interaction in flight. Pausing a paused session is a no-op.
   *
   * @throws {SessionNotFoundError}
   * @throws {InvalidRequestError} The session has already ended
   */
  async pauseSession(sessionId: string): Promise<SessionContext> {
    return this.store.withSession(sessionId, async () => {
      const ctx = await this.requireSession(sessionId);

      if (ctx.status === 'completed') {
        throw new InvalidRequestError(`Session '${sessionId}' has already ended`, {
          status: ctx.status,
        });
      }
      if (ctx.status === 'paused') {
        return ctx;
      }

      const now = this.now();
      ctx.status = 'paused';
      ctx.pausedAt = now;
      ctx.updatedAt = now;
      this.store.put(sessionId, ctx);

      try {
        await this.store.flush(sessionId);
      } catch (error) {
        console.warn(`[SessionOrchestrator] Pause flush failed for session ${sessionId}:`, error);
      }

      console.log(`[SessionOrchestrator] Paused session ${sessionId} at cursor ${ctx.cursor}`);
      return (await this.store.get(sessionId)) ?? ctx;
    });
  }

  /**
   * Makes a paused or interrupted session active again. Resuming an active
   * session returns it unchanged, whether or not it was evicted from the
   * fast tier in between.
   *
   * @throws {SessionNotFoundError}
   * @throws {InvalidRequestError} The session has already ended
   */
  async resumeSession(sessionId: string): Promise<SessionContext> {
    return this.store.withSession(sessionId, async () => {
      const ctx = await this.requireSession(sessionId);

      if (ctx.status === 'completed') {
        throw new InvalidRequestError(`Session '${sessionId}' has already ended`, {
          status: ctx.status,
        });
      }
      if (ctx.status === 'active') {
        return ctx;
      }

      const now = this.now();
      const previous = ctx.status;
      ctx.status = 'active';
      ctx.resumedAt = now;
      ctx.updatedAt = now;
      this.store.put(sessionId, ctx);

      console.log(`[SessionOrchestrator] Resumed ${previous} session ${sessionId}`);
      return ctx;
    });
  }

  /**
   * Completes the session, flushes it synchronously and releases its
   * fast-tier entry. Ending an ended session returns its summary again.
   *
   * @throws {SessionNotFoundError}
   */
  async endSession(sessionId: string): Promise<SessionSummary> {
    return this.store.withSession(sessionId, async () => {
      const ctx = await this.requireSession(sessionId);
      const alreadyEnded = ctx.status === 'completed';

      if (!alreadyEnded) {
        const now = this.now();
        ctx.status = 'completed';
        ctx.endedAt = now;
        ctx.updatedAt = now;
        this.store.put(sessionId, ctx);
      }

      let persisted = true;
      try {
        await this.store.evict(sessionId);
      } catch (error) {
        persisted = false;
        console.error(
          `[SessionOrchestrator] Final flush failed for session ${sessionId}; keeping it resident:`,
          error
        );
      }

      const summary = await this.summarize(ctx, persisted);

      if (!alreadyEnded) {
        console.log(
          `[SessionOrchestrator] Ended session ${sessionId}: ${ctx.interactionCount} interactions, accuracy ${summary.accuracy.toFixed(2)}`
        );
        this.publish({
          type: 'session_ended',
          sessionId,
          userId: ctx.userId,
          timestamp: ctx.endedAt ?? this.now(),
          interactionCount: ctx.interactionCount,
          outcomeCounts: { ...ctx.outcomeCounts },
          durationMs: summary.durationMs,
        });
      }

      return summary;
    });
  }

  /**
   * @throws {SessionNotFoundError}
   */
  async getSession(sessionId: string): Promise<SessionContext> {
    return this.store.withSession(sessionId, () => this.requireSession(sessionId));
  }

  /**
   * Rebuilds the session's effectiveness windows and signals from its event
   * log. Pending write-behind is flushed first so the log is complete.
   *
   * @throws {SessionNotFoundError}
   * @throws {StoreUnavailableError} The log could not be flushed or read
   */
  async replayEffectiveness(
    sessionId: string
  ): Promise<ReturnType<typeof replayWindows>> {
    return this.store.withSession(sessionId, async () => {
      const ctx = await this.requireSession(sessionId);
      await this.store.flush(sessionId);

      let records: InteractionLogRecord[];
      try {
        records = await this.durable.listInteractions(sessionId);
      } catch (error) {
        throw new StoreUnavailableError(`Could not read event log for session '${sessionId}'`, error);
      }

      const domainsByItem = new Map(ctx.queue.map((e) => [e.itemId, e.skillDomains]));
      return replayWindows(records, domainsByItem, this.controllerConfig);
    });
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Flushes and evicts sessions idle past the timeout. Status is left as it
   * is; the next operation reads the session back through. Sessions whose
   * flush fails stay resident and are retried on the next sweep.
   *
   * @returns Number of sessions evicted
   */
  async sweepIdleSessions(): Promise<number> {
    const { idleTimeoutMs } = this.sessionConfig;
    let evicted = 0;

    for (const sessionId of this.store.listIdle(idleTimeoutMs, this.now())) {
      await this.store.withSession(sessionId, async () => {
        // Touched while waiting for the lock
        if (!this.store.listIdle(idleTimeoutMs, this.now()).includes(sessionId)) {
          return;
        }

        try {
          await this.store.evict(sessionId);
          evicted += 1;
        } catch (error) {
          console.warn(`[SessionOrchestrator] Could not evict idle session ${sessionId}:`, error);
        }
      });
    }

    if (evicted > 0) {
      console.log(`[SessionOrchestrator] Evicted ${evicted} idle session(s)`);
    }
    return evicted;
  }

  /**
   * Deletes ended sessions older than the idle timeout plus the retention
   * grace period.
   *
   * @returns Number of sessions purged
   */
  async purgeExpiredSessions(): Promise<number> {
    const { idleTimeoutMs, retentionGraceMs } = this.sessionConfig;
    const cutoff = new Date(this.now().getTime() - idleTimeoutMs - retentionGraceMs);
    const purged = await this.durable.purgeEndedSessions(cutoff);
    if (purged > 0) {
      console.log(`[SessionOrchestrator] Purged ${purged} ended session(s)`);
    }
    return purged;
  }

  /**
   * Runs the idle sweep and retention purge on an interval. The timer does
   * not keep the process alive.
   */
  startBackgroundTasks(): void {
    if (this.maintenanceTimer) {
      return;
    }
    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance().catch((error: unknown) => {
        console.error('[SessionOrchestrator] Maintenance run failed:', error);
      });
    }, this.sessionConfig.sweepIntervalMs);
    this.maintenanceTimer.unref();
  }

  /**
   * Stops background tasks, marks resident active sessions 'interrupted',
   * flushes every resident session and waits for in-flight analytics. Interrupted sessions accept
   * interactions again after `resumeSession`.
   */
  async stop(): Promise<void> {
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }

    for (const sessionId of this.store.residentSessionIds()) {
      await this.store.withSession(sessionId, async () => {
        const ctx = await this.store.get(sessionId);
        if (ctx && ctx.status === 'active') {
          ctx.status = 'interrupted';
          ctx.updatedAt = this.now();
          this.store.put(sessionId, ctx);
        }
      });
    }

    await this.store.flushAll();
    await this.analytics.drain?.();
  }

  async runMaintenance(): Promise<void> {
    await this.sweepIdleSessions();
    await this.purgeExpiredSessions();
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async requireSession(sessionId: string): Promise<SessionContext> {
    const ctx = await this.store.get(sessionId);
    if (!ctx) {
      throw new SessionNotFoundError(sessionId);
    }
    return ctx;
  }

  private async tryRecover(sessionId: string): Promise<boolean> {
    try {
      await this.store.flush(sessionId);
      return true;
    } catch (error) {
      console.warn(
        `[SessionOrchestrator] Session ${sessionId} still degraded:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }
  }

  private degradedResponse(ctx: SessionContext): InteractResponse {
    return {
      sessionId: ctx.id,
      applied: false,
      degraded: true,
      nextItem: ctx.queue[ctx.cursor] ?? null,
      adaptation: null,
      reviewState: null,
      cursor: ctx.cursor,
      remaining: ctx.queue.length - ctx.cursor,
    };
  }

  /**
   * Union of every catalog item in the requested domains, within the
   * configured difficulty bounds.
   */
  private async fetchCatalog(domains: string[]): Promise<LearningItem[]> {
    const byId = new Map<string, LearningItem>();

    for (const domain of domains) {
      let items: LearningItem[];
      try {
        items = await withTimeout(
          this.content.fetchItems({
            domain,
            difficultyRange: {
              min: this.schedulerConfig.minDifficulty,
              max: this.schedulerConfig.maxDifficulty,
            },
            excludeIds: [],
          }),
          this.controllerConfig.contentTimeoutMs,
          `Catalog fetch for '${domain}'`
        );
      } catch (error) {
        throw new ContentServiceUnavailableError(
          `Could not fetch items for domain '${domain}'`,
          error
        );
      }
      for (const item of items) {
        byId.set(item.id, item);
      }
    }

    return [...byId.values()];
  }

  private async composeTutorPrompt(
    ctx: SessionContext,
    item: LearningItem,
    previousOutcome: InteractionEvent['outcome']
  ): Promise<string | undefined> {
    if (!this.tutor) {
      return undefined;
    }

    const domain = item.skillDomains[0];
    try {
      return await withTimeout(
        this.tutor.composePrompt({
          item,
          domainState: ctx.domainStates[domain]?.state ?? 'nominal',
          previousOutcome,
        }),
        this.sessionConfig.tutorTimeoutMs,
        'Tutor prompt'
      );
    } catch (error) {
      console.warn(
        `[SessionOrchestrator] Tutor prompt unavailable for session ${ctx.id}:`,
        error instanceof Error ? error.message : error
      );
      return undefined;
    }
  }

  private async summarize(ctx: SessionContext, persisted: boolean): Promise<SessionSummary> {
    const { correct, partial } = ctx.outcomeCounts;
    const n = ctx.interactionCount;
    const answered = ctx.queue.slice(0, ctx.cursor);
    const reviewedIds = [...new Set(answered.map((e) => e.itemId))];
    const endedAt = ctx.endedAt;
    const asOf = endedAt ?? this.now();
    const durationMs = asOf.getTime() - ctx.startedAt.getTime();

    const domains: DomainSummary[] = ctx.skillDomains.map((domain) => {
      const state = ctx.domainStates[domain] ?? initialDomainState();
      return {
        domain,
        signal: ctx.effectiveness[domain] ?? 0.5,
        state: state.state,
        transitions: state.transitions,
      };
    });

    let estimatedRetention: number | null = null;
    if (reviewedIds.length === 0) {
      estimatedRetention = 0;
    } else {
      try {
        const states = await this.durable.listReviewStates(ctx.userId, reviewedIds);
        estimatedRetention = this.retention.meanRetrievability(
          states,
          new Date(asOf.getTime() + DAY_MS)
        );
      } catch (error) {
        console.warn(
          `[SessionOrchestrator] Could not estimate retention for session ${ctx.id}:`,
          error instanceof Error ? error.message : error
        );
      }
    }

    return {
      sessionId: ctx.id,
      userId: ctx.userId,
      status: ctx.status,
      interactionCount: n,
      outcomeCounts: { ...ctx.outcomeCounts },
      accuracy: n === 0 ? 0 : (correct + 0.5 * partial) / n,
      meanLatencyMs: n === 0 ? 0 : ctx.totalLatencyMs / n,
      itemsReviewed: reviewedIds.length,
      itemsRemaining: ctx.queue.length - ctx.cursor,
      domains,
      estimatedRetention,
      learningVelocity: learningVelocity(correct, durationMs),
      difficultyProgression: difficultyProgression(answered, durationMs),
      estimatedMasteryMs: estimateMasteryMs(
        ctx.recentOutcomes,
        durationMs,
        this.sessionConfig.masteryThreshold
      ),
      startedAt: ctx.startedAt,
      endedAt,
      durationMs,
      persisted,
    };
  }

  private publish(record: AnalyticsRecord): void {
    this.analytics.publish(record).catch((error: unknown) => {
      console.error(`[SessionOrchestrator] Analytics publish failed (${record.type}):`, error);
    });
  }
}
