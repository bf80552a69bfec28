/**
 * AnalyticsEvent Repository Implementation
 *
 * Local storage for the analytics sink.
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { analyticsEvents } from '../schema';

export interface StoredAnalyticsEvent {
  id: number;
  type: string;
  sessionId: string;
  userId: string;
  payload: Record<string, unknown>;
  createdAt: Date;
}

export interface CreateAnalyticsEventInput {
  type: string;
  sessionId: string;
  userId: string;
  payload: Record<string, unknown>;
  createdAt: Date;
}

export class AnalyticsEventRepository {
  constructor(private readonly db: AppDatabase) {}

  async create(input: CreateAnalyticsEventInput): Promise<void> {
    await this.db.insert(analyticsEvents).values(input);
  }

  async findBySession(sessionId: string): Promise<StoredAnalyticsEvent[]> {
    return this.db
      .select()
      .from(analyticsEvents)
      .where(eq(analyticsEvents.sessionId, sessionId))
      .orderBy(asc(analyticsEvents.id));
  }
}
