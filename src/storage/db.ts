/**
 * Database Connection Factory
 *
 * Opens SQLite databases through better-sqlite3 and wraps them with Drizzle
 * ORM. Foreign keys are enforced and WAL journaling is enabled for file
 * databases so write-behind flushes do not block readers.
 *
 * Usage:
 *   // Application database (opened lazily from config)
 *   import { getDatabase } from '@/storage/db';
 *   const db = getDatabase();
 *
 *   // In-memory database with migrations applied (tests)
 *   import { openDatabase } from '@/storage/db';
 *   const { db, sqlite } = openDatabase(':memory:', { migrate: true });
 */

import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import * as schema from './schema';
import { config } from '../config';

/** drizzle-kit output folder at the project root */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countItems(database: AppDatabase) {
 *   return database.select().from(learningItems).all().length;
 * }
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  /** Raw connection, for pragmas and closing */
  sqlite: Database.Database;
}

export interface OpenDatabaseOptions {
  /** Apply pending migrations before returning */
  migrate?: boolean;
}

/**
 * Opens (or creates) an SQLite database and wraps it with Drizzle.
 *
 * @param dbPath - File path, or ':memory:' for an in-memory database
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): DatabaseHandle {
  const sqlite = new Database(dbPath);

  sqlite.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  const db = drizzle(sqlite, { schema });
  if (options.migrate) {
    // Tracked in __drizzle_migrations; already-applied migrations are skipped
    migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  }

  return { db, sqlite };
}

/**
 * Creates a Drizzle instance for the given path with migrations applied.
 */
export function createDatabase(dbPath: string = config.database.path): AppDatabase {
  return openDatabase(dbPath, { migrate: true }).db;
}

let defaultHandle: DatabaseHandle | null = null;

/**
 * Default application database, opened on first use from DATABASE_PATH.
 */
export function getDatabase(): AppDatabase {
  if (!defaultHandle) {
    defaultHandle = openDatabase(config.database.path, { migrate: true });
  }
  return defaultHandle.db;
}

/**
 * Closes the default database if it was opened.
 */
export function closeDatabase(): void {
  defaultHandle?.sqlite.close();
  defaultHandle = null;
}
