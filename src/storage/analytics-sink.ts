/**
 * Analytics Sinks
 *
 * DrizzleAnalyticsSink writes records to the analytics_events table;
 * NoopAnalyticsSink discards them. Both satisfy the best-effort contract:
 * callers never await them on the request path.
 *
 * better-sqlite3 runs statements synchronously, so the insert is pushed to
 * the next turn of the event loop; `publish` returns before it runs.
 */

import { setImmediate } from 'node:timers/promises';
import type { AppDatabase } from './db';
import { AnalyticsEventRepository } from './repositories';
import type { AnalyticsRecord, AnalyticsSink } from '@/core/ports';

/**
 * Flattens a record into a JSON-safe payload. Dates become ISO strings.
 */
function toPayload(record: AnalyticsRecord): Record<string, unknown> {
  const { type: _type, sessionId: _sessionId, userId: _userId, timestamp: _timestamp, ...rest } =
    record;
  const payload: unknown = JSON.parse(JSON.stringify(rest));
  return typeof payload === 'object' && payload !== null && !Array.isArray(payload)
    ? Object.fromEntries(Object.entries(payload))
    : {};
}

export class DrizzleAnalyticsSink implements AnalyticsSink {
  private readonly repo: AnalyticsEventRepository;
  private readonly pending = new Set<Promise<void>>();

  constructor(db: AppDatabase) {
    this.repo = new AnalyticsEventRepository(db);
  }

  async publish(record: AnalyticsRecord): Promise<void> {
    const write = this.write(record);
    this.pending.add(write);
    try {
      await write;
    } finally {
      this.pending.delete(write);
    }
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async write(record: AnalyticsRecord): Promise<void> {
    await setImmediate();
    await this.repo.create({
      type: record.type,
      sessionId: record.sessionId,
      userId: record.userId,
      payload: toPayload(record),
      createdAt: record.timestamp,
    });
  }
}

export class NoopAnalyticsSink implements AnalyticsSink {
  async publish(_record: AnalyticsRecord): Promise<void> {}
}
