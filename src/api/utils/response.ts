/**
 * Response Helpers
 *
 * Build the standard success and error envelopes so every route answers in
 * the same shape.
 *
 * @example
 * ```typescript
 * router.get('/:id', async (c) => {
 *   const session = await orchestrator.getSession(c.req.param('id'));
 *   return success(c, session);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Omit rather than serialize undefined
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

export function notFound(c: Context, resource: string, id: string | number): Response {
  return error(c, 'NOT_FOUND', `${resource} with ID '${id}' not found`, 404, { resource, id });
}
