/**
 * Storage Module - Barrel Export
 *
 * SQLite-backed adapters for the engine's collaborator contracts, plus the
 * schema and database helpers they are built on.
 *
 * Usage:
 *   import { openDatabase, SqliteDurableStore } from '@/storage';
 *   const { db } = openDatabase(':memory:', { migrate: true });
 *   const durable = new SqliteDurableStore(db);
 */

export {
  openDatabase,
  createDatabase,
  getDatabase,
  closeDatabase,
  MIGRATIONS_FOLDER,
} from './db';
export type { AppDatabase, DatabaseHandle, OpenDatabaseOptions } from './db';

export { SqliteDurableStore } from './sqlite-durable-store';
export { CatalogContentService } from './catalog-content-service';
export { DrizzleAnalyticsSink, NoopAnalyticsSink } from './analytics-sink';

export {
  learningItems,
  reviewStates,
  sessionContexts,
  interactionEvents,
  analyticsEvents,
} from './schema';

export type {
  LearningItemRow,
  NewLearningItemRow,
  ReviewStateRow,
  NewReviewStateRow,
  SessionContextRow,
  InteractionEventRow,
  AnalyticsEventRow,
} from './schema';
