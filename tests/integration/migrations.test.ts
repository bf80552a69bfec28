/**
 * Integration Tests: Drizzle Migrations
 *
 * Applies the generated migrations in ./drizzle to a fresh in-memory
 * database and checks the resulting tables against the schema.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { openDatabase, MIGRATIONS_FOLDER, type DatabaseHandle } from '../../src/storage/db';
import { reviewStates } from '../../src/storage/schema';
import { BASE_TIME } from '../helpers';

describe('Drizzle migrations', () => {
  let handle: DatabaseHandle | null = null;

  afterEach(() => {
    handle?.sqlite.close();
    handle = null;
  });

  function tableNames(current: DatabaseHandle): string[] {
    return current.sqlite
      .prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .pluck()
      .all()
      .map(String);
  }

  it('creates every table and records the migration', () => {
    handle = openDatabase(':memory:', { migrate: true });

    expect(tableNames(handle)).toEqual([
      '__drizzle_migrations',
      'analytics_events',
      'interaction_events',
      'learning_items',
      'review_states',
      'session_contexts',
    ]);
    expect(handle.sqlite.prepare('SELECT COUNT(*) FROM __drizzle_migrations').pluck().get()).toBe(1);
  });

  it('skips migrations that were already applied', () => {
    handle = openDatabase(':memory:', { migrate: true });

    migrate(handle.db, { migrationsFolder: MIGRATIONS_FOLDER });

    expect(handle.sqlite.prepare('SELECT COUNT(*) FROM __drizzle_migrations').pluck().get()).toBe(1);
  });

  it('leaves a database opened without migrate empty', () => {
    handle = openDatabase(':memory:');
    expect(tableNames(handle)).toEqual([]);
  });

  it('applies column defaults from the schema', () => {
    handle = openDatabase(':memory:', { migrate: true });

    handle.db
      .insert(reviewStates)
      .values({
        userId: 'user_1',
        itemId: 'item_1',
        stability: 1,
        difficulty: 2.5,
        nextDueAt: BASE_TIME,
        version: 1,
        updatedAt: BASE_TIME,
      })
      .run();

    const row = handle.db.select().from(reviewStates).get();
    expect(row).toMatchObject({ repetitions: 0, reviewCount: 0, lapses: 0, lastReviewedAt: null });
  });
});
