/**
 * Engine Composition Root
 *
 * Wires the SQLite adapters, the two-tier session store and the optional
 * tutor into a SessionOrchestrator. The HTTP server and the integration
 * tests both build their engine here.
 *
 * @example
 * ```typescript
 * const { db } = openDatabase(config.database.path, { migrate: true });
 * const engine = createEngine({ db, config });
 * engine.orchestrator.startBackgroundTasks();
 * ```
 */

import type { AppDatabase } from './storage/db';
import { SqliteDurableStore } from './storage/sqlite-durable-store';
import { CatalogContentService } from './storage/catalog-content-service';
import { DrizzleAnalyticsSink } from './storage/analytics-sink';
import { SessionStateStore } from './core/state';
import { SessionOrchestrator } from './core/session';
import type { AnalyticsSink, ContentService, DurableStore, TutoringService } from './core/ports';
import type { Config } from './config';

export interface EngineOptions {
  db: AppDatabase;
  config: Pick<Config, 'scheduler' | 'controller' | 'session' | 'store'>;
  tutor?: TutoringService;
  /** Replaces the catalog-backed Content Service */
  content?: ContentService;
  /** Replaces the table-backed analytics sink */
  analytics?: AnalyticsSink;
  now?: () => Date;
}

export interface Engine {
  orchestrator: SessionOrchestrator;
  store: SessionStateStore;
  durable: DurableStore;
  content: ContentService;
  analytics: AnalyticsSink;
}

export function createEngine(options: EngineOptions): Engine {
  const { db, config, now } = options;

  const durable = new SqliteDurableStore(db);
  const content = options.content ?? new CatalogContentService(db);
  const analytics = options.analytics ?? new DrizzleAnalyticsSink(db);
  const store = new SessionStateStore({ durable, now }, config.store);

  const orchestrator = new SessionOrchestrator(
    { store, durable, content, analytics, tutor: options.tutor, now },
    {
      scheduler: config.scheduler,
      controller: config.controller,
      session: config.session,
      store: config.store,
    }
  );

  return { orchestrator, store, durable, content, analytics };
}
