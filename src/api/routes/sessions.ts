/**
 * Session Routes
 *
 * HTTP surface of the Session Orchestrator:
 *
 * - POST /                   - Start a session
 * - GET  /:id                - Current session state
 * - POST /:id/interactions   - Apply one interaction event
 * - POST /:id/pause          - Pause (waits for in-flight interactions)
 * - POST /:id/resume         - Resume a paused or interrupted session
 * - POST /:id/end            - End the session and return its summary
 *
 * Engine errors propagate to the global error handler, which maps them to
 * status codes (INVALID_EVENT 409, SESSION_NOT_FOUND 404, ...).
 */

import { Hono } from 'hono';
import type { SessionContext } from '@/core/models';
import type { SessionOrchestrator } from '@/core/session';
import { success } from '../utils/response';
import { parseBody } from '../middleware/validate';
import { interactionSchema, startSessionSchema } from '../types';

// ============================================================================
// Response Shapes
// ============================================================================

/**
 * Client view of a session. Internal bookkeeping (effectiveness windows,
 * applied event ids) stays server-side.
 */
export interface SessionView {
  id: string;
  userId: string;
  skillDomains: string[];
  status: SessionContext['status'];
  cursor: number;
  remaining: number;
  queue: SessionContext['queue'];
  nextItem: SessionContext['queue'][number] | null;
  interactionCount: number;
  effectiveness: SessionContext['effectiveness'];
  domainStates: Record<string, SessionContext['domainStates'][string]['state']>;
  allowExtraCurricular: boolean;
  degraded: boolean;
  startedAt: Date;
  updatedAt: Date;
  pausedAt: Date | null;
  resumedAt: Date | null;
  endedAt: Date | null;
}

export function toSessionView(ctx: SessionContext): SessionView {
  const domainStates: SessionView['domainStates'] = {};
  for (const [domain, state] of Object.entries(ctx.domainStates)) {
    domainStates[domain] = state.state;
  }

  return {
    id: ctx.id,
    userId: ctx.userId,
    skillDomains: ctx.skillDomains,
    status: ctx.status,
    cursor: ctx.cursor,
    remaining: Math.max(0, ctx.queue.length - ctx.cursor),
    queue: ctx.queue,
    nextItem: ctx.queue[ctx.cursor] ?? null,
    interactionCount: ctx.interactionCount,
    effectiveness: ctx.effectiveness,
    domainStates,
    allowExtraCurricular: ctx.allowExtraCurricular,
    degraded: ctx.degraded,
    startedAt: ctx.startedAt,
    updatedAt: ctx.updatedAt,
    pausedAt: ctx.pausedAt,
    resumedAt: ctx.resumedAt,
    endedAt: ctx.endedAt,
  };
}

function generateEventId(): string {
  return `evt_${crypto.randomUUID()}`;
}

// ============================================================================
// Route Definitions
// ============================================================================

export function sessionsRoutes(orchestrator: SessionOrchestrator): Hono {
  const router = new Hono();

  /**
   * POST /
   *
   * Body: { userId, skillDomains, maxItems?, allowExtraCurricular? }
   * Response: 201 with the new session. The queue may be empty.
   */
  router.post('/', async (c) => {
    const body = await parseBody(c, startSessionSchema);
    const ctx = await orchestrator.startSession(body.userId, body.skillDomains, {
      maxItems: body.maxItems,
      allowExtraCurricular: body.allowExtraCurricular,
    });
    return success(c, toSessionView(ctx), 201);
  });

  router.get('/:id', async (c) => {
    const ctx = await orchestrator.getSession(c.req.param('id'));
    return success(c, toSessionView(ctx));
  });

  /**
   * POST /:id/interactions
   *
   * Body: { itemId, outcome, latencyMs, id?, occurredAt?, cursor?, extraCurricular? }
   *
   * Sending the cursor from the last response lets the server reject answers
   * to a question the session has already moved past. Response is 200 even
   * when the session is degraded; check `applied` and `degraded`.
   */
  router.post('/:id/interactions', async (c) => {
    const sessionId = c.req.param('id');
    const body = await parseBody(c, interactionSchema);

    const response = await orchestrator.interact(sessionId, {
      id: body.id ?? generateEventId(),
      sessionId,
      itemId: body.itemId,
      outcome: body.outcome,
      latencyMs: body.latencyMs,
      occurredAt: body.occurredAt ? new Date(body.occurredAt) : new Date(),
      cursor: body.cursor,
      extraCurricular: body.extraCurricular,
    });

    return success(c, response);
  });

  router.post('/:id/pause', async (c) => {
    const ctx = await orchestrator.pauseSession(c.req.param('id'));
    return success(c, toSessionView(ctx));
  });

  router.post('/:id/resume', async (c) => {
    const ctx = await orchestrator.resumeSession(c.req.param('id'));
    return success(c, toSessionView(ctx));
  });

  router.post('/:id/end', async (c) => {
    const summary = await orchestrator.endSession(c.req.param('id'));
    return success(c, summary);
  });

  return router;
}
