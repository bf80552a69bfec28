/**
 * Global Error Handler
 *
 * Turns every error thrown below it into the standard JSON envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... }
 *   }
 * }
 * ```
 *
 * Engine errors keep their own code and gain an HTTP status: invalid events
 * are conflicts with the session's state, unavailable collaborators are
 * 503s (with `retriable: true` in the details).
 *
 * Hono catches errors at the handler that threw them, so this is registered
 * with `app.onError` rather than as a middleware.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/protected', () => {
 *   throw new AppError('UNAUTHORIZED', 'Authentication required', 401);
 * });
 * ```
 */

import type { Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { EngineError, EngineErrorCodes, type EngineErrorCode } from '@/core/errors';
import type { ApiErrorResponse } from '../types';

export type { ApiErrorResponse } from '../types';

/**
 * Error codes produced by the HTTP layer itself.
 */
export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each engine error code.
 */
export const ENGINE_ERROR_STATUS: Record<EngineErrorCode, ContentfulStatusCode> = {
  [EngineErrorCodes.INVALID_EVENT]: 409,
  [EngineErrorCodes.INVALID_REQUEST]: 400,
  [EngineErrorCodes.SESSION_NOT_FOUND]: 404,
  [EngineErrorCodes.SCHEDULER_BOUNDS_VIOLATION]: 500,
  [EngineErrorCodes.STORE_UNAVAILABLE]: 503,
  [EngineErrorCodes.CONTENT_SERVICE_UNAVAILABLE]: 503,
};

/**
 * Error with an explicit HTTP status, for failures the routes detect
 * themselves.
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid request parameters', 400, {
 *   field: 'latencyMs',
 * });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof EngineError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          details: { ...error.details, retriable: error.retriable },
        },
      },
      statusCode: ENGINE_ERROR_STATUS[error.code],
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev ? error.message : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Non-Error throws
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(isDev && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the application-wide error handler.
 */
export function errorHandler(): ErrorHandler {
  return (error: unknown, c: Context) => {
    const { response, statusCode } = formatErrorResponse(error);

    // Expected client errors are not worth a stack trace
    if (statusCode >= 500) {
      console.error('[Error Handler]', error);
    } else {
      console.warn(`[Error Handler] ${response.error.code}: ${response.error.message}`);
    }

    return c.json(response, statusCode);
  };
}

export function notFoundError(resource: string, id: string | number): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, `${resource} with ID '${id}' not found`, 404, {
    resource,
    id,
  });
}

export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}
