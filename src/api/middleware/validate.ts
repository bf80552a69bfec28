/**
 * Request Validation
 *
 * Parses JSON request bodies against zod schemas. Failures become
 * VALIDATION_ERROR (with one detail per failing field) or INVALID_JSON,
 * both 400, through the global error handler.
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const body = await parseBody(c, startSessionSchema);
 *   // body is fully typed here
 * });
 * ```
 */

import type { Context } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { AppError, ErrorCodes, validationError } from './error-handler';

export function toValidationDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Reads and validates the request's JSON body.
 *
 * @throws {AppError} INVALID_JSON or VALIDATION_ERROR
 */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400);
    }
    throw err;
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw validationError('Invalid request body', toValidationDetails(result.error));
  }
  return result.data;
}

/**
 * Validates the query string.
 *
 * @throws {AppError} VALIDATION_ERROR
 */
export function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw validationError('Invalid query parameters', toValidationDetails(result.error));
  }
  return result.data;
}
