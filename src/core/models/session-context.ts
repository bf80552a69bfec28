/**
 * SessionContext Domain Types
 *
 * A SessionContext is the full mutable state of one learning session: its
 * ordered item queue, the cursor into that queue, and the per-domain
 * feedback-loop state the Adaptive Controller maintains. It lives in the
 * fast tier of the Session State Store while the session is active and is
 * written behind to the Durable Store.
 */

import type { InteractionSample } from './interaction';
import type { Outcome } from './review-state';

/**
 * Session lifecycle status.
 *
 * - 'active': accepting interactions
 * - 'paused': explicitly paused by the learner
 * - 'interrupted': was active when the engine shut down; resumable
 * - 'completed': ended; read-only
 */
export type SessionStatus = 'active' | 'paused' | 'interrupted' | 'completed';

/**
 * Why an entry is in the queue.
 *
 * Only 'due' entries must satisfy nextDueAt <= now at session start; the
 * other sources are deliberate insertions.
 */
export type QueueEntrySource = 'due' | 'remediation' | 'escalation' | 'extra_curricular';

export interface QueueEntry {
  itemId: string;
  skillDomains: string[];
  baseDifficulty: number;
  /** Passed through from the LearningItem so clients can render the entry */
  payloadRef: string;
  nextDueAt: Date;
  stability: number;
  source: QueueEntrySource;
}

/** Per-domain feedback loop state */
export type ControllerState = 'nominal' | 'struggling' | 'accelerating';

export interface DomainControllerState {
  state: ControllerState;

  /** Consecutive signals above the high threshold while nominal */
  aboveHighStreak: number;

  /** Consecutive signals at or above the low threshold while struggling */
  recoveryStreak: number;

  /** Number of transitions this session */
  transitions: number;
}

export type OutcomeCounts = Record<Outcome, number>;

export interface SessionContext {
  /** Unique identifier (format: sess_[uuid]) */
  id: string;
  userId: string;
  skillDomains: string[];
  status: SessionStatus;

  queue: QueueEntry[];

  /** Index of the next unanswered entry; entries before it are answered */
  cursor: number;

  interactionCount: number;

  /** Rolling effectiveness score per domain, in [0, 1] */
  effectiveness: Record<string, number>;

  domainStates: Record<string, DomainControllerState>;

  /** Sliding window of recent samples per domain */
  windows: Record<string, InteractionSample[]>;

  /** Recently applied event ids, newest last */
  appliedEventIds: string[];

  outcomeCounts: OutcomeCounts;

  /** Sum of latencies for the session mean */
  totalLatencyMs: number;

  /** Outcomes of the latest interactions, newest last */
  recentOutcomes: Outcome[];

  allowExtraCurricular: boolean;

  /** Set when durable writes are exhausted; the session is read-only */
  degraded: boolean;

  startedAt: Date;
  updatedAt: Date;
  pausedAt: Date | null;
  resumedAt: Date | null;
  endedAt: Date | null;
}
