/**
 * Durable Store Contract
 *
 * The persistent tier behind the Session State Store. Review states are
 * written with compare-and-swap on their version; session contexts are
 * written whole (last write wins, ordered per session by the state store);
 * interaction events are appended and must tolerate re-delivery.
 */

import type { InteractionEvent, ReviewState, SessionContext } from '../models';

export type CompareAndSwapResult =
  | { ok: true; state: ReviewState }
  | { ok: false; current: ReviewState | null };

/**
 * One entry of the per-session event log.
 */
export interface InteractionLogRecord {
  event: InteractionEvent;
  userId: string;
  /** 1-based apply order within the session */
  sequence: number;
}

export interface DurableStore {
  getReviewState(userId: string, itemId: string): Promise<ReviewState | null>;

  /** All states for a user, or only those for the given items */
  listReviewStates(userId: string, itemIds?: string[]): Promise<ReviewState[]>;

  /** States whose lapse counter is at least `minLapses` */
  listLapsedReviewStates(userId: string, minLapses: number): Promise<ReviewState[]>;

  /**
   * Writes `state` only if the stored version equals `expectedVersion`
   * (0 meaning no row yet). On success the stored state carries
   * `expectedVersion + 1`.
   */
  compareAndSwapReviewState(
    state: ReviewState,
    expectedVersion: number
  ): Promise<CompareAndSwapResult>;

  getSessionContext(sessionId: string): Promise<SessionContext | null>;

  putSessionContext(ctx: SessionContext): Promise<void>;

  /** Idempotent on (sessionId, event id) */
  appendInteraction(record: InteractionLogRecord): Promise<void>;

  /** Events in apply order */
  listInteractions(sessionId: string): Promise<InteractionLogRecord[]>;

  /**
   * Deletes sessions (and their event log) that ended before the cutoff.
   * Returns the number of sessions removed.
   */
  purgeEndedSessions(endedBefore: Date): Promise<number>;
}
