/**
 * Core Domain Models - Barrel Export
 *
 * Pure types shared by every engine component. No runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { ReviewState, SessionContext } from '@/core/models';
 * ```
 */

export type { LearningItem, DifficultyRange } from './learning-item';

export type { Outcome, ReviewState } from './review-state';

export type { InteractionEvent, InteractionSample } from './interaction';

export type {
  SessionStatus,
  QueueEntrySource,
  QueueEntry,
  ControllerState,
  DomainControllerState,
  OutcomeCounts,
  SessionContext,
} from './session-context';
