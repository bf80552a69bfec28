/**
 * API Routes - Central Router
 *
 * Mounts the route modules under /api:
 * - GET /api           - API information
 * - /api/sessions      - Session lifecycle and interactions
 *
 * The health check is mounted at /health by the server, outside /api.
 */

import { Hono } from 'hono';
import type { SessionOrchestrator } from '@/core/session';
import { success } from '../utils/response';
import { sessionsRoutes } from './sessions';

export { healthRoutes, type HealthCheckData } from './health';
export { sessionsRoutes, toSessionView, type SessionView } from './sessions';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

const API_VERSION = '0.1.0';

export function createApiRouter(orchestrator: SessionOrchestrator): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Adaptive Session Engine API',
      version: API_VERSION,
      endpoints: [
        { path: '/api/sessions', description: 'Start a session' },
        { path: '/api/sessions/:id', description: 'Session state' },
        { path: '/api/sessions/:id/interactions', description: 'Apply an interaction' },
        { path: '/api/sessions/:id/pause', description: 'Pause a session' },
        { path: '/api/sessions/:id/resume', description: 'Resume a session' },
        { path: '/api/sessions/:id/end', description: 'End a session and get its summary' },
        { path: '/health', description: 'Health check' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/sessions', sessionsRoutes(orchestrator));

  return router;
}

export default createApiRouter;
