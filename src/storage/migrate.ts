/**
 * Database Migration Runner
 *
 * Applies pending Drizzle migrations from ./drizzle to the database at
 * DATABASE_PATH, creating the file if it does not exist.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/var/data/sessions.db npm run db:migrate
 *
 * Applied migrations are recorded in __drizzle_migrations, so running the
 * script again only applies new ones.
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { MIGRATIONS_FOLDER } from './db';
import { config } from '../config';

const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);
console.log(`[migrate] Migrations folder: ${MIGRATIONS_FOLDER}`);

const sqlite = new Database(dbPath);

try {
  sqlite.pragma('foreign_keys = ON');
  migrate(drizzle(sqlite), { migrationsFolder: MIGRATIONS_FOLDER });

  console.log('[migrate] Migrations completed successfully.');

  const tables = sqlite
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name != '__drizzle_migrations' ORDER BY name"
    )
    .pluck()
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${String(table)}`);
  }
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exitCode = 1;
} finally {
  sqlite.close();
}
