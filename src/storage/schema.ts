/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for the SQLite durable tier. Migrations in ./drizzle
 * are generated from this file with `npm run db:generate`.
 *
 * - learning_items: the content catalog the Content Service reads
 * - review_states: one row per (user, item), versioned for compare-and-swap
 * - session_contexts: write-behind snapshots of live sessions
 * - interaction_events: append-only event log, replayable per session
 * - analytics_events: local analytics sink
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  primaryKey,
} from 'drizzle-orm/sqlite-core';
import type { SerializedSessionContext } from './codecs/session-context';

/**
 * Learning Items Table
 *
 * Immutable content units. The engine only reads this table; authoring
 * happens elsewhere (or through the seed script).
 */
export const learningItems = sqliteTable(
  'learning_items',
  {
    // Catalog identifier
    id: text('id').primaryKey(),

    // Skill domain tags as a JSON array of strings
    skillDomains: text('skill_domains', { mode: 'json' }).$type<string[]>().notNull(),

    // Authored difficulty on the scheduler's difficulty scale
    baseDifficulty: real('base_difficulty').notNull(),

    // Opaque reference to the renderable payload
    payloadRef: text('payload_ref').notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    difficultyIdx: index('learning_items_difficulty_idx').on(table.baseDifficulty),
  })
);

/**
 * Review States Table
 *
 * Scheduling state per learner and item. Never deleted. Writes go through
 * a version check so concurrent sessions cannot lose each other's updates.
 */
export const reviewStates = sqliteTable(
  'review_states',
  {
    userId: text('user_id').notNull(),

    itemId: text('item_id').notNull(),

    // Consecutive successes since the last lapse
    repetitions: integer('repetitions').notNull().default(0),

    // Total reviews applied
    reviewCount: integer('review_count').notNull().default(0),

    // Interval in days
    stability: real('stability').notNull(),

    // Clamped difficulty factor
    difficulty: real('difficulty').notNull(),

    lastReviewedAt: integer('last_reviewed_at', { mode: 'timestamp_ms' }),

    nextDueAt: integer('next_due_at', { mode: 'timestamp_ms' }).notNull(),

    // Rolling lapse counter
    lapses: integer('lapses').notNull().default(0),

    // Incremented on every successful write
    version: integer('version').notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.userId, table.itemId] }),
    userDueIdx: index('review_states_user_due_idx').on(table.userId, table.nextDueAt),
  })
);

/**
 * Session Contexts Table
 *
 * Each row holds the full serialized SessionContext. Status and timestamps
 * are duplicated into columns so retention purges can filter without
 * parsing JSON.
 */
export const sessionContexts = sqliteTable(
  'session_contexts',
  {
    id: text('id').primaryKey(),

    userId: text('user_id').notNull(),

    status: text('status', {
      enum: ['active', 'paused', 'interrupted', 'completed'],
    }).notNull(),

    // Serialized SessionContext (dates as ISO strings)
    payload: text('payload', { mode: 'json' }).$type<SerializedSessionContext>().notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),

    endedAt: integer('ended_at', { mode: 'timestamp_ms' }),
  },
  (table) => ({
    userIdx: index('session_contexts_user_idx').on(table.userId),
    endedIdx: index('session_contexts_ended_idx').on(table.endedAt),
  })
);

/**
 * Interaction Events Table
 *
 * Append-only log of applied events. Event ids are client-generated, so
 * the key is scoped to the session.
 */
export const interactionEvents = sqliteTable(
  'interaction_events',
  {
    sessionId: text('session_id').notNull(),

    eventId: text('event_id').notNull(),

    userId: text('user_id').notNull(),

    itemId: text('item_id').notNull(),

    outcome: text('outcome', { enum: ['correct', 'incorrect', 'partial'] }).notNull(),

    latencyMs: integer('latency_ms').notNull(),

    occurredAt: integer('occurred_at', { mode: 'timestamp_ms' }).notNull(),

    // Position in the session's apply order (1-based)
    sequence: integer('sequence').notNull(),

    recordedAt: integer('recorded_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sessionId, table.eventId] }),
    sessionSeqIdx: index('interaction_events_session_seq_idx').on(
      table.sessionId,
      table.sequence
    ),
  })
);

/**
 * Analytics Events Table
 *
 * Best-effort sink. Rows may be missing if a write failed; nothing reads
 * this table on the request path.
 */
export const analyticsEvents = sqliteTable(
  'analytics_events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    type: text('type').notNull(),

    sessionId: text('session_id').notNull(),

    userId: text('user_id').notNull(),

    payload: text('payload', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    sessionIdx: index('analytics_events_session_idx').on(table.sessionId),
  })
);

// Inferred row types
export type LearningItemRow = typeof learningItems.$inferSelect;
export type NewLearningItemRow = typeof learningItems.$inferInsert;
export type ReviewStateRow = typeof reviewStates.$inferSelect;
export type NewReviewStateRow = typeof reviewStates.$inferInsert;
export type SessionContextRow = typeof sessionContexts.$inferSelect;
export type InteractionEventRow = typeof interactionEvents.$inferSelect;
export type AnalyticsEventRow = typeof analyticsEvents.$inferSelect;
