/**
 * Analytics Sink Contract
 *
 * Best-effort event stream. Publishing never blocks a session operation,
 * and a failed publish is logged and dropped.
 */

import type { ControllerState, InteractionEvent, Outcome } from '../models';

interface AnalyticsBase {
  sessionId: string;
  userId: string;
  timestamp: Date;
}

export type AnalyticsRecord =
  | (AnalyticsBase & {
      type: 'session_started';
      skillDomains: string[];
      queueLength: number;
    })
  | (AnalyticsBase & {
      type: 'interaction';
      event: InteractionEvent;
      signals: Record<string, number>;
      nextDueAt: Date;
    })
  | (AnalyticsBase & {
      type: 'adaptation';
      domain: string;
      from: ControllerState;
      to: ControllerState;
      signal: number;
      injectedItemIds: string[];
      degraded: boolean;
    })
  | (AnalyticsBase & {
      type: 'session_ended';
      interactionCount: number;
      outcomeCounts: Record<Outcome, number>;
      durationMs: number;
    });

export type AnalyticsRecordType = AnalyticsRecord['type'];

export interface AnalyticsSink {
  publish(record: AnalyticsRecord): Promise<void>;

  /** Resolves once every publish started so far has settled */
  drain?(): Promise<void>;
}
