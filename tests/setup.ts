/**
 * Test Setup Module
 *
 * Builds isolated environments for integration and API tests: an in-memory
 * SQLite database with migrations applied, an engine wired to it with a
 * manual clock, and the Hono app on top.
 *
 * Also holds the zod schemas API tests use to read response bodies.
 */

import type Database from 'better-sqlite3';
import type { Hono } from 'hono';
import { z } from 'zod';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { openDatabase, MIGRATIONS_FOLDER, type AppDatabase } from '../src/storage/db';
import { LearningItemRepository } from '../src/storage/repositories';
import { createEngine, type Engine } from '../src/engine';
import { createApp } from '../src/api/app';
import {
  DEFAULT_CONTROLLER_CONFIG,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_SESSION_CONFIG,
  type Config,
} from '../src/config';
import type { LearningItem } from '../src/core/models';
import type { ContentService, TutoringService } from '../src/core/ports';
import { ManualClock } from './helpers';

// ============================================================================
// Database
// ============================================================================

export interface TestDatabaseContext {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Fresh in-memory database with every Drizzle migration from ./drizzle
 * applied.
 */
export function createTestDatabase(): TestDatabaseContext {
  const handle = openDatabase(':memory:');
  migrate(handle.db, { migrationsFolder: MIGRATIONS_FOLDER });
  return handle;
}

export function cleanupTestDatabase(context: TestDatabaseContext): void {
  context.sqlite.close();
}

export async function seedCatalog(db: AppDatabase, items: LearningItem[]): Promise<void> {
  await new LearningItemRepository(db).createMany(items);
}

// ============================================================================
// Engine and App
// ============================================================================

/**
 * Engine configuration for tests: strict scheduler bounds and no retry
 * delays, so failures surface immediately.
 */
export const TEST_ENGINE_CONFIG: Pick<Config, 'scheduler' | 'controller' | 'session' | 'store'> = {
  scheduler: { ...DEFAULT_SCHEDULER_CONFIG, strictBounds: true },
  controller: DEFAULT_CONTROLLER_CONFIG,
  session: DEFAULT_SESSION_CONFIG,
  store: { maxWriteRetries: 1, retryBaseDelayMs: 0 },
};

export interface TestContext extends TestDatabaseContext {
  clock: ManualClock;
  engine: Engine;
  app: Hono;
}

export interface TestContextOptions {
  content?: ContentService;
  tutor?: TutoringService;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const database = createTestDatabase();
  const clock = new ManualClock();
  const engine = createEngine({
    db: database.db,
    config: TEST_ENGINE_CONFIG,
    content: options.content,
    tutor: options.tutor,
    now: clock.now,
  });
  const app = createApp(engine, { logger: false });

  return { ...database, clock, engine, app };
}

/**
 * Flushes pending write-behind, then closes the database.
 */
export async function cleanupTestContext(context: TestContext): Promise<void> {
  await context.engine.orchestrator.stop();
  cleanupTestDatabase(context);
}

// ============================================================================
// Response Schemas
// ============================================================================

export function successEnvelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ success: z.literal(true), data });
}

export const errorEnvelope = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).or(z.array(z.unknown())).optional(),
  }),
});

export const queueEntryBody = z.object({
  itemId: z.string(),
  source: z.string(),
  baseDifficulty: z.number(),
});

export const sessionBody = z.object({
  id: z.string(),
  userId: z.string(),
  status: z.string(),
  cursor: z.number(),
  remaining: z.number(),
  queue: z.array(queueEntryBody),
  nextItem: queueEntryBody.nullable(),
  interactionCount: z.number(),
  domainStates: z.record(z.string()),
  degraded: z.boolean(),
  pausedAt: z.string().nullable(),
  endedAt: z.string().nullable(),
});

export const interactBody = z.object({
  sessionId: z.string(),
  applied: z.boolean(),
  degraded: z.boolean(),
  nextItem: queueEntryBody.nullable(),
  cursor: z.number(),
  remaining: z.number(),
  reviewState: z
    .object({ stability: z.number(), version: z.number(), nextDueAt: z.string() })
    .nullable(),
  tutorPrompt: z.string().optional(),
});

export const summaryBody = z.object({
  sessionId: z.string(),
  status: z.string(),
  interactionCount: z.number(),
  accuracy: z.number(),
  itemsReviewed: z.number(),
  itemsRemaining: z.number(),
  persisted: z.boolean(),
});

/**
 * Sends a JSON request to the app.
 */
export function requestJson(
  app: Hono,
  method: 'GET' | 'POST',
  path: string,
  body?: unknown
): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      ...(body !== undefined && { body: JSON.stringify(body) }),
    })
  );
}
