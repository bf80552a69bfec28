/**
 * InteractionEvent Repository Implementation
 *
 * Append-only event log. Appends are idempotent on (sessionId, eventId) so
 * a retried write-behind never duplicates an event.
 */

import { asc, eq, inArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { interactionEvents } from '../schema';
import type { InteractionLogRecord } from '@/core/ports';

function mapToDomain(row: typeof interactionEvents.$inferSelect): InteractionLogRecord {
  return {
    userId: row.userId,
    sequence: row.sequence,
    event: {
      id: row.eventId,
      sessionId: row.sessionId,
      itemId: row.itemId,
      outcome: row.outcome,
      latencyMs: row.latencyMs,
      occurredAt: row.occurredAt,
    },
  };
}

export class InteractionEventRepository {
  constructor(private readonly db: AppDatabase) {}

  async append(record: InteractionLogRecord, recordedAt: Date = new Date()): Promise<void> {
    const { event } = record;
    await this.db
      .insert(interactionEvents)
      .values({
        sessionId: event.sessionId,
        eventId: event.id,
        userId: record.userId,
        itemId: event.itemId,
        outcome: event.outcome,
        latencyMs: Math.round(event.latencyMs),
        occurredAt: event.occurredAt,
        sequence: record.sequence,
        recordedAt,
      })
      .onConflictDoNothing();
  }

  async findBySession(sessionId: string): Promise<InteractionLogRecord[]> {
    const results = await this.db
      .select()
      .from(interactionEvents)
      .where(eq(interactionEvents.sessionId, sessionId))
      .orderBy(asc(interactionEvents.sequence));
    return results.map(mapToDomain);
  }

  async deleteBySessions(sessionIds: string[]): Promise<void> {
    if (sessionIds.length === 0) {
      return;
    }
    await this.db.delete(interactionEvents).where(inArray(interactionEvents.sessionId, sessionIds));
  }
}
