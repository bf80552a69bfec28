/**
 * API Module - Barrel Export
 *
 * HTTP surface of the engine, built on Hono.
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp(createEngine({ db, config }));
 * const res = await app.request('/api/sessions', { method: 'POST', body });
 * ```
 */

export { createApp, type CreateAppOptions } from './app';

export {
  errorHandler,
  AppError,
  ErrorCodes,
  ENGINE_ERROR_STATUS,
  notFoundError,
  validationError,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  parseBody,
  parseQuery,
  type ErrorCode,
  type LoggerConfig,
} from './middleware';

export { createApiRouter, healthRoutes, sessionsRoutes, toSessionView, type SessionView } from './routes';

export {
  startSessionSchema,
  interactionSchema,
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  type StartSessionInput,
  type InteractionInput,
} from './types';

export { success, error, notFound } from './utils/response';
