/**
 * Session Types
 *
 * Inputs and results of the Session Orchestrator and the Interaction
 * Pipeline. These are the structured responses callers see, in process or
 * as the `data` of an API response; fields are only ever added.
 */

import type {
  ControllerState,
  OutcomeCounts,
  QueueEntry,
  ReviewState,
  SessionContext,
  SessionStatus,
} from '../models';
import type { AdaptationHint } from '../adaptation';

export interface StartSessionOptions {
  /** Cap on the initial queue; defaults to the configured session size */
  maxItems?: number;
  /** Accept interactions on items outside the queue */
  allowExtraCurricular?: boolean;
}

/**
 * What the pipeline produced for one applied interaction.
 */
export interface InteractionResult {
  /** Entry at the new cursor, or null when the queue is exhausted */
  nextItem: QueueEntry | null;
  adaptation: AdaptationHint;
  reviewState: ReviewState;
}

export interface PipelineOutcome {
  /** Session state after the interaction, as stored */
  context: SessionContext;
  result: InteractionResult;
}

/**
 * Response to an interaction.
 *
 * When `applied` is false the session is degraded (read-only): nothing was
 * changed and the same event can be sent again later.
 */
export interface InteractResponse {
  sessionId: string;
  applied: boolean;
  degraded: boolean;
  nextItem: QueueEntry | null;
  adaptation: AdaptationHint | null;
  reviewState: ReviewState | null;
  cursor: number;
  /** Pending entries, including nextItem */
  remaining: number;
  /** Tutor's phrasing of the next item, when a tutor is configured */
  tutorPrompt?: string;
}

export interface DomainSummary {
  domain: string;
  signal: number;
  state: ControllerState;
  transitions: number;
}

export interface SessionSummary {
  sessionId: string;
  userId: string;
  status: SessionStatus;
  interactionCount: number;
  outcomeCounts: OutcomeCounts;
  /** Partial answers count half; 0 for a session without interactions */
  accuracy: number;
  meanLatencyMs: number;
  /** Distinct items answered */
  itemsReviewed: number;
  itemsRemaining: number;
  domains: DomainSummary[];
  /**
   * Mean predicted recall of the reviewed items one day after the session,
   * or null when their review states could not be read
   */
  estimatedRetention: number | null;
  /** Correct answers per hour of session time */
  learningVelocity: number;
  /**
   * Base difficulty of the last answered entry minus the first, per hour
   * of session time. Positive when the session moved to harder material.
   */
  difficultyProgression: number;
  /**
   * Projected time until the rolling accuracy reaches the mastery
   * threshold: 0 when it already has, null without enough data to project
   */
  estimatedMasteryMs: number | null;
  startedAt: Date;
  endedAt: Date | null;
  durationMs: number;
  /** False when the final flush did not reach the durable tier */
  persisted: boolean;
}
