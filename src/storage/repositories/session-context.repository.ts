/**
 * SessionContext Repository Implementation
 *
 * Stores whole SessionContext snapshots as JSON. The state store orders
 * writes per session, so an upsert here is always the newest snapshot.
 */

import { and, eq, inArray, isNotNull, lt } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionContexts } from '../schema';
import type { SessionContext } from '@/core/models';
import { decodeSessionContext, encodeSessionContext } from '../codecs/session-context';

export class SessionContextRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * @throws {z.ZodError} If the stored payload is corrupted
   */
  async findById(id: string): Promise<SessionContext | null> {
    const result = await this.db
      .select()
      .from(sessionContexts)
      .where(eq(sessionContexts.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return decodeSessionContext(result[0].payload);
  }

  async upsert(ctx: SessionContext): Promise<void> {
    const row = {
      userId: ctx.userId,
      status: ctx.status,
      payload: encodeSessionContext(ctx),
      updatedAt: ctx.updatedAt,
      endedAt: ctx.endedAt,
    };

    await this.db
      .insert(sessionContexts)
      .values({ id: ctx.id, ...row })
      .onConflictDoUpdate({ target: sessionContexts.id, set: row });
  }

  /**
   * Ids of sessions that ended before the cutoff.
   */
  async findEndedBefore(cutoff: Date): Promise<string[]> {
    const result = await this.db
      .select({ id: sessionContexts.id })
      .from(sessionContexts)
      .where(and(isNotNull(sessionContexts.endedAt), lt(sessionContexts.endedAt, cutoff)));
    return result.map((row) => row.id);
  }

  async deleteMany(ids: string[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const result = await this.db
      .delete(sessionContexts)
      .where(inArray(sessionContexts.id, ids))
      .returning({ id: sessionContexts.id });
    return result.length;
  }
}
