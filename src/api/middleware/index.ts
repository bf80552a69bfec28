/**
 * API Middleware - Barrel Export
 */

export {
  errorHandler,
  AppError,
  ErrorCodes,
  ENGINE_ERROR_STATUS,
  notFoundError,
  validationError,
  type ErrorCode,
  type ApiErrorResponse,
} from './error-handler';

export {
  loggerMiddleware,
  formatLogLine,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

export { parseBody, parseQuery, toValidationDetails } from './validate';
