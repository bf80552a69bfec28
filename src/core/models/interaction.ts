/**
 * Interaction Domain Types
 *
 * An InteractionEvent is the learner's response to one item. Events are
 * immutable: they are applied once to session state and appended to the
 * event log, from which effectiveness windows can be rebuilt.
 */

import type { Outcome } from './review-state';

export interface InteractionEvent {
  /** Client-generated identifier; re-sending an applied id is rejected */
  id: string;
  sessionId: string;
  itemId: string;
  outcome: Outcome;

  /** Time from prompt display to answer */
  latencyMs: number;

  occurredAt: Date;

  /**
   * Queue cursor the client saw when answering. An event carrying a cursor
   * behind the session's current cursor has been superseded.
   */
  cursor?: number;

  /** Learner asked to review an item outside the scheduled queue */
  extraCurricular?: boolean;
}

/**
 * Compact record of one interaction kept in a domain's sliding window.
 */
export interface InteractionSample {
  eventId: string;
  itemId: string;
  outcome: Outcome;
  latencyMs: number;
  occurredAt: Date;
}
