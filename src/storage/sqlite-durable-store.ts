/**
 * SQLite Durable Store
 *
 * Implements the engine's DurableStore contract over the Drizzle
 * repositories. Purging a session drops its event log before the session
 * row.
 */

import type { AppDatabase } from './db';
import {
  InteractionEventRepository,
  ReviewStateRepository,
  SessionContextRepository,
} from './repositories';
import type { ReviewState, SessionContext } from '@/core/models';
import type { CompareAndSwapResult, DurableStore, InteractionLogRecord } from '@/core/ports';

export class SqliteDurableStore implements DurableStore {
  private readonly reviewRepo: ReviewStateRepository;
  private readonly sessionRepo: SessionContextRepository;
  private readonly eventRepo: InteractionEventRepository;

  constructor(db: AppDatabase) {
    this.reviewRepo = new ReviewStateRepository(db);
    this.sessionRepo = new SessionContextRepository(db);
    this.eventRepo = new InteractionEventRepository(db);
  }

  getReviewState(userId: string, itemId: string): Promise<ReviewState | null> {
    return this.reviewRepo.find(userId, itemId);
  }

  listReviewStates(userId: string, itemIds?: string[]): Promise<ReviewState[]> {
    return this.reviewRepo.findByUser(userId, itemIds);
  }

  listLapsedReviewStates(userId: string, minLapses: number): Promise<ReviewState[]> {
    return this.reviewRepo.findLapsed(userId, minLapses);
  }

  compareAndSwapReviewState(
    state: ReviewState,
    expectedVersion: number
  ): Promise<CompareAndSwapResult> {
    return this.reviewRepo.compareAndSwap(state, expectedVersion);
  }

  getSessionContext(sessionId: string): Promise<SessionContext | null> {
    return this.sessionRepo.findById(sessionId);
  }

  putSessionContext(ctx: SessionContext): Promise<void> {
    return this.sessionRepo.upsert(ctx);
  }

  appendInteraction(record: InteractionLogRecord): Promise<void> {
    return this.eventRepo.append(record);
  }

  listInteractions(sessionId: string): Promise<InteractionLogRecord[]> {
    return this.eventRepo.findBySession(sessionId);
  }

  async purgeEndedSessions(endedBefore: Date): Promise<number> {
    const ids = await this.sessionRepo.findEndedBefore(endedBefore);
    if (ids.length === 0) {
      return 0;
    }

    await this.eventRepo.deleteBySessions(ids);
    return this.sessionRepo.deleteMany(ids);
  }
}
