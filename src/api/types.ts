/**
 * API Types
 *
 * Response envelopes and zod request schemas for the session endpoints.
 * Every response is either `{ success: true, data }` or
 * `{ success: false, error }`.
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable error code, e.g. 'INVALID_EVENT' or 'VALIDATION_ERROR' */
  code: string;
  message: string;
  /** Field errors for validation failures; engine context otherwise */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

export const startSessionSchema = z.object({
  userId: z.string().trim().min(1, 'userId is required'),
  skillDomains: z
    .array(z.string().trim().min(1, 'Skill domains cannot be blank'))
    .min(1, 'At least one skill domain is required'),
  maxItems: z.number().int().positive().optional(),
  allowExtraCurricular: z.boolean().optional(),
});

export type StartSessionInput = z.infer<typeof startSessionSchema>;

/**
 * Body of POST /api/sessions/:id/interactions. The session id comes from
 * the path; `id` and `occurredAt` are filled in when the client omits them.
 */
export const interactionSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  itemId: z.string().min(1, 'itemId is required'),
  outcome: z.enum(['correct', 'incorrect', 'partial']),
  latencyMs: z.number().nonnegative().finite(),
  occurredAt: z.string().datetime({ offset: true }).optional(),
  cursor: z.number().int().nonnegative().optional(),
  extraCurricular: z.boolean().optional(),
});

export type InteractionInput = z.infer<typeof interactionSchema>;
