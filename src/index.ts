/**
 * Adaptive Session Engine - Library Entry Point
 *
 * Spaced-repetition scheduling, two-tier session state and per-domain
 * difficulty adaptation behind one orchestrator.
 *
 * @example
 * ```typescript
 * import { createEngine, openDatabase, config } from 'adaptive-session-engine';
 *
 * const { db } = openDatabase(config.database.path, { migrate: true });
 * const { orchestrator } = createEngine({ db, config });
 *
 * const session = await orchestrator.startSession('user_1', ['greetings']);
 * ```
 *
 * To run the HTTP server instead: `npm run server`.
 */

export { createEngine, type Engine, type EngineOptions } from './engine';

export * from './core/models';
export * from './core/errors';
export * from './core/ports';
export * from './core/scheduler';
export * from './core/adaptation';
export * from './core/state';
export * from './core/session';

export {
  config,
  parseConfig,
  validateConfig,
  ConfigValidationError,
  type Config,
  type SchedulerConfig,
  type ControllerConfig,
  type SessionConfig,
  type StoreConfig,
} from './config';

export {
  openDatabase,
  SqliteDurableStore,
  CatalogContentService,
  DrizzleAnalyticsSink,
  NoopAnalyticsSink,
  type AppDatabase,
} from './storage';

export { AnthropicClient, AnthropicTutoringService, LLMError } from './llm';

export { createApp } from './api/app';
