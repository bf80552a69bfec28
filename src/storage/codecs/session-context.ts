/**
 * SessionContext JSON Codec
 *
 * Converts a SessionContext to and from the JSON payload stored in
 * session_contexts. Dates travel as ISO strings. Decoding validates the
 * payload with zod so a corrupted row fails loudly instead of producing a
 * half-typed context.
 */

import { z } from 'zod';
import type { SessionContext } from '@/core/models';

const isoDate = z.string().datetime();

const outcomeSchema = z.enum(['correct', 'incorrect', 'partial']);

const queueEntrySchema = z.object({
  itemId: z.string(),
  skillDomains: z.array(z.string()),
  baseDifficulty: z.number(),
  payloadRef: z.string(),
  nextDueAt: isoDate,
  stability: z.number(),
  source: z.enum(['due', 'remediation', 'escalation', 'extra_curricular']),
});

const sampleSchema = z.object({
  eventId: z.string(),
  itemId: z.string(),
  outcome: outcomeSchema,
  latencyMs: z.number(),
  occurredAt: isoDate,
});

const domainStateSchema = z.object({
  state: z.enum(['nominal', 'struggling', 'accelerating']),
  aboveHighStreak: z.number().int(),
  recoveryStreak: z.number().int(),
  transitions: z.number().int(),
});

export const serializedSessionContextSchema = z.object({
  id: z.string(),
  userId: z.string(),
  skillDomains: z.array(z.string()),
  status: z.enum(['active', 'paused', 'interrupted', 'completed']),
  queue: z.array(queueEntrySchema),
  cursor: z.number().int().nonnegative(),
  interactionCount: z.number().int().nonnegative(),
  effectiveness: z.record(z.number()),
  domainStates: z.record(domainStateSchema),
  windows: z.record(z.array(sampleSchema)),
  appliedEventIds: z.array(z.string()),
  outcomeCounts: z.object({
    correct: z.number().int(),
    incorrect: z.number().int(),
    partial: z.number().int(),
  }),
  totalLatencyMs: z.number(),
  recentOutcomes: z.array(outcomeSchema).default([]),
  allowExtraCurricular: z.boolean(),
  degraded: z.boolean(),
  startedAt: isoDate,
  updatedAt: isoDate,
  pausedAt: isoDate.nullable(),
  resumedAt: isoDate.nullable(),
  endedAt: isoDate.nullable(),
});

export type SerializedSessionContext = z.infer<typeof serializedSessionContextSchema>;

function toIso(date: Date | null): string | null {
  return date === null ? null : date.toISOString();
}

function fromIso(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

export function encodeSessionContext(ctx: SessionContext): SerializedSessionContext {
  const windows: SerializedSessionContext['windows'] = {};
  for (const [domain, samples] of Object.entries(ctx.windows)) {
    windows[domain] = samples.map((sample) => ({
      ...sample,
      occurredAt: sample.occurredAt.toISOString(),
    }));
  }

  return {
    ...ctx,
    queue: ctx.queue.map((entry) => ({
      ...entry,
      skillDomains: [...entry.skillDomains],
      nextDueAt: entry.nextDueAt.toISOString(),
    })),
    windows,
    startedAt: ctx.startedAt.toISOString(),
    updatedAt: ctx.updatedAt.toISOString(),
    pausedAt: toIso(ctx.pausedAt),
    resumedAt: toIso(ctx.resumedAt),
    endedAt: toIso(ctx.endedAt),
  };
}

/**
 * @throws {z.ZodError} If the payload does not match the schema
 */
export function decodeSessionContext(payload: unknown): SessionContext {
  const raw = serializedSessionContextSchema.parse(payload);

  const windows: SessionContext['windows'] = {};
  for (const [domain, samples] of Object.entries(raw.windows)) {
    windows[domain] = samples.map((sample) => ({
      ...sample,
      occurredAt: new Date(sample.occurredAt),
    }));
  }

  return {
    ...raw,
    queue: raw.queue.map((entry) => ({ ...entry, nextDueAt: new Date(entry.nextDueAt) })),
    windows,
    startedAt: new Date(raw.startedAt),
    updatedAt: new Date(raw.updatedAt),
    pausedAt: fromIso(raw.pausedAt),
    resumedAt: fromIso(raw.resumedAt),
    endedAt: fromIso(raw.endedAt),
  };
}
