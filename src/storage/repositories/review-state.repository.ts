/**
 * ReviewState Repository Implementation
 *
 * Data access for per-learner scheduling state. Writes are conditional on
 * the row's version column: a write carrying a stale expected version
 * changes nothing and reports the row it lost to.
 */

import { and, eq, gte, inArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { reviewStates } from '../schema';
import type { ReviewState } from '@/core/models';
import type { CompareAndSwapResult } from '@/core/ports';

function mapToDomain(row: typeof reviewStates.$inferSelect): ReviewState {
  return {
    userId: row.userId,
    itemId: row.itemId,
    repetitions: row.repetitions,
    reviewCount: row.reviewCount,
    stability: row.stability,
    difficulty: row.difficulty,
    lastReviewedAt: row.lastReviewedAt,
    nextDueAt: row.nextDueAt,
    lapses: row.lapses,
    version: row.version,
  };
}

/**
 * Repository for ReviewState rows, keyed by (userId, itemId).
 *
 * @example
 * ```typescript
 * const repo = new ReviewStateRepository(db);
 * const result = await repo.compareAndSwap(next, current.version);
 * if (!result.ok) {
 *   // someone else wrote first; reschedule from result.current
 * }
 * ```
 */
export class ReviewStateRepository {
  constructor(private readonly db: AppDatabase) {}

  async find(userId: string, itemId: string): Promise<ReviewState | null> {
    const result = await this.db
      .select()
      .from(reviewStates)
      .where(and(eq(reviewStates.userId, userId), eq(reviewStates.itemId, itemId)))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  async findByUser(userId: string, itemIds?: string[]): Promise<ReviewState[]> {
    if (itemIds !== undefined && itemIds.length === 0) {
      return [];
    }

    const condition =
      itemIds === undefined
        ? eq(reviewStates.userId, userId)
        : and(eq(reviewStates.userId, userId), inArray(reviewStates.itemId, itemIds));

    const results = await this.db.select().from(reviewStates).where(condition);
    return results.map(mapToDomain);
  }

  async findLapsed(userId: string, minLapses: number): Promise<ReviewState[]> {
    const results = await this.db
      .select()
      .from(reviewStates)
      .where(and(eq(reviewStates.userId, userId), gte(reviewStates.lapses, minLapses)));
    return results.map(mapToDomain);
  }

  /**
   * Writes the state if the stored version matches. Version 0 means the
   * row must not exist yet.
   */
  async compareAndSwap(
    state: ReviewState,
    expectedVersion: number,
    now: Date = new Date()
  ): Promise<CompareAndSwapResult> {
    const values = {
      repetitions: state.repetitions,
      reviewCount: state.reviewCount,
      stability: state.stability,
      difficulty: state.difficulty,
      lastReviewedAt: state.lastReviewedAt,
      nextDueAt: state.nextDueAt,
      lapses: state.lapses,
      version: expectedVersion + 1,
      updatedAt: now,
    };

    const written =
      expectedVersion === 0
        ? await this.db
            .insert(reviewStates)
            .values({ userId: state.userId, itemId: state.itemId, ...values })
            .onConflictDoNothing()
            .returning()
        : await this.db
            .update(reviewStates)
            .set(values)
            .where(
              and(
                eq(reviewStates.userId, state.userId),
                eq(reviewStates.itemId, state.itemId),
                eq(reviewStates.version, expectedVersion)
              )
            )
            .returning();

    if (written.length === 0) {
      return { ok: false, current: await this.find(state.userId, state.itemId) };
    }

    return { ok: true, state: mapToDomain(written[0]) };
  }
}
