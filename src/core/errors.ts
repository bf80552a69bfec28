/**
 * Engine Error Types
 *
 * Every failure the engine can raise extends EngineError, which carries a
 * machine-readable code and whether the caller may retry the same request.
 * The HTTP layer maps these codes onto status codes; in-process callers can
 * switch on `code` or use instanceof.
 *
 * Only InvalidEventError, InvalidRequestError and SessionNotFoundError
 * reach a caller once a session is running. StoreUnavailableError and
 * ContentServiceUnavailableError are absorbed there and surface as degraded
 * flags; the one exception is starting a session, which cannot build a
 * queue without content and fails with a retriable error.
 * SchedulerBoundsViolationError is raised only when strict bounds checking
 * is on (test runs).
 */

export const EngineErrorCodes = {
  INVALID_EVENT: 'INVALID_EVENT',
  INVALID_REQUEST: 'INVALID_REQUEST',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  SCHEDULER_BOUNDS_VIOLATION: 'SCHEDULER_BOUNDS_VIOLATION',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  CONTENT_SERVICE_UNAVAILABLE: 'CONTENT_SERVICE_UNAVAILABLE',
} as const;

export type EngineErrorCode = (typeof EngineErrorCodes)[keyof typeof EngineErrorCodes];

/**
 * Base class for all engine errors.
 */
export class EngineError extends Error {
  /** Machine-readable error code */
  readonly code: EngineErrorCode;
  /** Whether re-sending the same request can succeed */
  readonly retriable: boolean;
  /** Additional context for logs and API responses */
  readonly details?: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    retriable: boolean,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    this.retriable = retriable;
    this.details = details;
  }
}

/**
 * Reasons an interaction event can be rejected.
 */
export type InvalidEventReason =
  | 'malformed_event'
  | 'session_mismatch'
  | 'session_not_active'
  | 'duplicate_event'
  | 'superseded_cursor'
  | 'item_not_in_queue'
  | 'item_already_answered'
  | 'item_unknown';

/**
 * The event cannot be applied. Session state is left untouched.
 */
export class InvalidEventError extends EngineError {
  readonly reason: InvalidEventReason;

  constructor(reason: InvalidEventReason, message: string, details?: Record<string, unknown>) {
    super(EngineErrorCodes.INVALID_EVENT, message, false, { reason, ...details });
    this.name = 'InvalidEventError';
    this.reason = reason;
  }
}

/**
 * A session operation was called with arguments it cannot act on (no skill
 * domains, ending a session twice in a conflicting way, resuming a
 * completed session).
 */
export class InvalidRequestError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(EngineErrorCodes.INVALID_REQUEST, message, false, details);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Neither tier knows the session. Terminal: the caller must start a new one.
 */
export class SessionNotFoundError extends EngineError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(EngineErrorCodes.SESSION_NOT_FOUND, `Session with ID '${sessionId}' not found`, false, {
      sessionId,
    });
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/**
 * A scheduled value fell outside its configured bounds.
 */
export class SchedulerBoundsViolationError extends EngineError {
  constructor(field: string, value: number, min: number, max: number) {
    super(
      EngineErrorCodes.SCHEDULER_BOUNDS_VIOLATION,
      `Scheduler produced ${field}=${value} outside [${min}, ${max}]`,
      false,
      { field, value, min, max }
    );
    this.name = 'SchedulerBoundsViolationError';
  }
}

/**
 * The durable tier rejected or failed a write.
 */
export class StoreUnavailableError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super(EngineErrorCodes.STORE_UNAVAILABLE, message, true, undefined, { cause });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * The Content Service failed or timed out.
 */
export class ContentServiceUnavailableError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super(EngineErrorCodes.CONTENT_SERVICE_UNAVAILABLE, message, true, undefined, { cause });
    this.name = 'ContentServiceUnavailableError';
  }
}
