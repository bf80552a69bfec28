/**
 * Hono Application Factory
 *
 * Builds the HTTP application around an engine. Kept separate from the
 * server entry point so tests can drive it with `app.request()` without
 * opening a port.
 *
 * Middleware order:
 * 1. Logger - one line per request with timing
 * 2. Routes - /health and /api
 * Errors from any route reach the global handler registered with onError.
 */

import { Hono } from 'hono';
import type { Engine } from '@/engine';
import { errorHandler, loggerMiddleware, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';

export interface CreateAppOptions {
  logger?: Partial<LoggerConfig> | false;
}

/**
 * @example
 * ```typescript
 * const engine = createEngine({ db, config });
 * const app = createApp(engine);
 * const res = await app.request('/health');
 * ```
 */
export function createApp(
  engine: Pick<Engine, 'orchestrator' | 'store'>,
  options: CreateAppOptions = {}
): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (options.logger !== false) {
    app.use('*', loggerMiddleware(options.logger));
  }

  app.route('/health', healthRoutes(engine.store));
  app.route('/api', createApiRouter(engine.orchestrator));

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  return app;
}
