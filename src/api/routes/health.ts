/**
 * Health Check Route
 *
 * GET /health - liveness check. Also reports how many sessions are resident
 * in the fast tier and how many of them are degraded, without touching the
 * database.
 */

import { Hono } from 'hono';
import type { SessionStateStore } from '@/core/state';
import { success } from '../utils/response';

export interface HealthCheckData {
  /** 'degraded' when any resident session has unflushed writes */
  status: 'ok' | 'degraded';
  timestamp: string;
  environment: string;
  version: string;
  residentSessions: number;
  degradedSessions: number;
}

const APP_VERSION = '0.1.0';

export function healthRoutes(store: SessionStateStore): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const resident = store.residentSessionIds();
    const degraded = resident.filter((id) => store.isDegraded(id)).length;

    const healthData: HealthCheckData = {
      status: degraded > 0 ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
      residentSessions: resident.length,
      degradedSessions: degraded,
    };

    return success(c, healthData);
  });

  return router;
}
