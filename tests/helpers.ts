/**
 * Test Helpers Module
 *
 * Fixture builders, a controllable clock and in-process fakes for the
 * engine's collaborators. Nothing here touches SQLite; tests that need the
 * real durable tier use tests/setup.ts instead.
 */

import type {
  InteractionEvent,
  LearningItem,
  Outcome,
  ReviewState,
  SessionContext,
} from '../src/core/models';
import type {
  AnalyticsRecord,
  AnalyticsSink,
  CompareAndSwapResult,
  ContentQuery,
  ContentService,
  DurableStore,
  InteractionLogRecord,
  TutoringService,
  TutorPromptRequest,
} from '../src/core/ports';

// ============================================================================
// Date Utilities
// ============================================================================

export const BASE_TIME = new Date('2024-01-15T10:00:00Z');

export const DAY = 24 * 60 * 60 * 1000;

/**
 * Returns BASE_TIME shifted by the given number of days.
 */
export function daysFrom(base: Date, days: number): Date {
  return new Date(base.getTime() + days * DAY);
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock {
  private current: number;

  constructor(start: Date = BASE_TIME) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(date: Date): void {
    this.current = date.getTime();
  }
}

// ============================================================================
// Fixture Builders
// ============================================================================

export function createLearningItem(overrides: Partial<LearningItem> = {}): LearningItem {
  const id = overrides.id ?? `item_${crypto.randomUUID()}`;
  return {
    id,
    skillDomains: ['greetings'],
    baseDifficulty: 2.5,
    payloadRef: `content://${id}`,
    ...overrides,
  };
}

export function createReviewState(overrides: Partial<ReviewState> = {}): ReviewState {
  return {
    userId: 'user_1',
    itemId: 'item_1',
    repetitions: 0,
    reviewCount: 0,
    stability: 0,
    difficulty: 2.5,
    lastReviewedAt: null,
    nextDueAt: BASE_TIME,
    lapses: 0,
    version: 0,
    ...overrides,
  };
}

export function createSessionContext(overrides: Partial<SessionContext> = {}): SessionContext {
  return {
    id: 'sess_test',
    userId: 'user_1',
    skillDomains: ['greetings'],
    status: 'active',
    queue: [],
    cursor: 0,
    interactionCount: 0,
    effectiveness: {},
    domainStates: {},
    windows: {},
    appliedEventIds: [],
    outcomeCounts: { correct: 0, incorrect: 0, partial: 0 },
    totalLatencyMs: 0,
    recentOutcomes: [],
    allowExtraCurricular: false,
    degraded: false,
    startedAt: BASE_TIME,
    updatedAt: BASE_TIME,
    pausedAt: null,
    resumedAt: null,
    endedAt: null,
    ...overrides,
  };
}

let eventCounter = 0;

export function createEvent(
  sessionId: string,
  itemId: string,
  outcome: Outcome,
  overrides: Partial<InteractionEvent> = {}
): InteractionEvent {
  eventCounter += 1;
  return {
    id: `evt_${eventCounter}`,
    sessionId,
    itemId,
    outcome,
    latencyMs: 2000,
    occurredAt: BASE_TIME,
    ...overrides,
  };
}

// ============================================================================
// Collaborator Fakes
// ============================================================================

function reviewKey(userId: string, itemId: string): string {
  return `${userId}::${itemId}`;
}

/**
 * Map-backed DurableStore with switchable failure injection.
 */
export class InMemoryDurableStore implements DurableStore {
  readonly reviewStates = new Map<string, ReviewState>();
  readonly sessions = new Map<string, SessionContext>();
  readonly events = new Map<string, InteractionLogRecord[]>();

  /** When false every write rejects */
  writable = true;
  /** Remaining writes to reject before succeeding again */
  failNextWrites = 0;
  /** Count of successful session context writes */
  sessionWrites = 0;

  private checkWrite(): void {
    if (!this.writable) {
      throw new Error('durable store offline');
    }
    if (this.failNextWrites > 0) {
      this.failNextWrites -= 1;
      throw new Error('durable store write failed');
    }
  }

  async getReviewState(userId: string, itemId: string): Promise<ReviewState | null> {
    const state = this.reviewStates.get(reviewKey(userId, itemId));
    return state ? structuredClone(state) : null;
  }

  async listReviewStates(userId: string, itemIds?: string[]): Promise<ReviewState[]> {
    return [...this.reviewStates.values()]
      .filter((s) => s.userId === userId && (itemIds === undefined || itemIds.includes(s.itemId)))
      .map((s) => structuredClone(s));
  }

  async listLapsedReviewStates(userId: string, minLapses: number): Promise<ReviewState[]> {
    return (await this.listReviewStates(userId)).filter((s) => s.lapses >= minLapses);
  }

  async compareAndSwapReviewState(
    state: ReviewState,
    expectedVersion: number
  ): Promise<CompareAndSwapResult> {
    this.checkWrite();
    const key = reviewKey(state.userId, state.itemId);
    const current = this.reviewStates.get(key);
    const currentVersion = current?.version ?? 0;

    if (currentVersion !== expectedVersion) {
      return { ok: false, current: current ? structuredClone(current) : null };
    }

    const stored = { ...structuredClone(state), version: expectedVersion + 1 };
    this.reviewStates.set(key, stored);
    return { ok: true, state: structuredClone(stored) };
  }

  /** Seeds a state directly, bypassing version checks */
  seedReviewState(state: ReviewState): void {
    this.reviewStates.set(reviewKey(state.userId, state.itemId), structuredClone(state));
  }

  async getSessionContext(sessionId: string): Promise<SessionContext | null> {
    const ctx = this.sessions.get(sessionId);
    return ctx ? structuredClone(ctx) : null;
  }

  async putSessionContext(ctx: SessionContext): Promise<void> {
    this.checkWrite();
    this.sessions.set(ctx.id, structuredClone(ctx));
    this.sessionWrites += 1;
  }

  async appendInteraction(record: InteractionLogRecord): Promise<void> {
    this.checkWrite();
    const log = this.events.get(record.event.sessionId) ?? [];
    if (!log.some((r) => r.event.id === record.event.id)) {
      log.push(structuredClone(record));
    }
    this.events.set(record.event.sessionId, log);
  }

  async listInteractions(sessionId: string): Promise<InteractionLogRecord[]> {
    return [...(this.events.get(sessionId) ?? [])]
      .sort((a, b) => a.sequence - b.sequence)
      .map((r) => structuredClone(r));
  }

  async purgeEndedSessions(endedBefore: Date): Promise<number> {
    let removed = 0;
    for (const [id, ctx] of this.sessions) {
      if (ctx.endedAt !== null && ctx.endedAt.getTime() < endedBefore.getTime()) {
        this.sessions.delete(id);
        this.events.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}

/**
 * Content Service over a fixed item list. Records every query.
 */
export class FakeContentService implements ContentService {
  readonly queries: ContentQuery[] = [];
  /** When set, fetchItems rejects with this error */
  failWith: Error | null = null;
  /** When set, fetchItems waits this long before answering */
  delayMs = 0;

  constructor(private readonly items: LearningItem[]) {}

  async fetchItems(query: ContentQuery): Promise<LearningItem[]> {
    this.queries.push(structuredClone(query));
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) {
      throw this.failWith;
    }

    const matches = this.items.filter(
      (item) =>
        item.skillDomains.includes(query.domain) &&
        item.baseDifficulty >= query.difficultyRange.min &&
        item.baseDifficulty <= query.difficultyRange.max &&
        !query.excludeIds.includes(item.id)
    );
    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  async getItems(ids: string[]): Promise<LearningItem[]> {
    return this.items.filter((item) => ids.includes(item.id));
  }
}

/**
 * Analytics sink that keeps everything it receives.
 */
export class RecordingAnalyticsSink implements AnalyticsSink {
  readonly records: AnalyticsRecord[] = [];
  failWith: Error | null = null;

  async publish(record: AnalyticsRecord): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.records.push(record);
  }

  ofType<T extends AnalyticsRecord['type']>(type: T): Extract<AnalyticsRecord, { type: T }>[] {
    return this.records.filter(
      (record): record is Extract<AnalyticsRecord, { type: T }> => record.type === type
    );
  }
}

/**
 * Tutor that answers with a fixed template, or fails on demand.
 */
export class FakeTutoringService implements TutoringService {
  readonly requests: TutorPromptRequest[] = [];
  failWith: Error | null = null;

  async composePrompt(request: TutorPromptRequest): Promise<string> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    return `Let's practise ${request.item.id}`;
  }
}

/**
 * Resolves after pending microtasks and zero-delay timers have run.
 */
export async function settle(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}
