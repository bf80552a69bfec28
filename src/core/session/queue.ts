/**
 * Session Queue Ordering
 *
 * A session queue is split by its cursor: entries before the cursor have
 * been answered, entries from the cursor on are pending. Only the pending
 * part is ever reordered.
 *
 * Pending order:
 * 1. Entries injected by the Adaptive Controller or requested as
 *    extra-curricular review, in the order they were added
 * 2. Due entries (nextDueAt <= now) before not-yet-due ones
 * 3. Ascending nextDueAt
 * 4. Ascending stability, so less stable items surface first
 */

import type { LearningItem, QueueEntry, QueueEntrySource, ReviewState } from '../models';

export function isInjected(entry: QueueEntry): boolean {
  return entry.source !== 'due';
}

export function compareQueueEntries(a: QueueEntry, b: QueueEntry, now: Date): number {
  const injectedA = isInjected(a);
  const injectedB = isInjected(b);
  if (injectedA || injectedB) {
    // Array.prototype.sort is stable, so injected entries keep their order
    return injectedA === injectedB ? 0 : injectedA ? -1 : 1;
  }

  const nowMs = now.getTime();
  const dueA = a.nextDueAt.getTime() <= nowMs;
  const dueB = b.nextDueAt.getTime() <= nowMs;
  if (dueA !== dueB) {
    return dueA ? -1 : 1;
  }

  return a.nextDueAt.getTime() - b.nextDueAt.getTime() || a.stability - b.stability;
}

/**
 * Returns a new queue with the answered prefix untouched and the pending
 * part sorted.
 */
export function sortPending(queue: QueueEntry[], cursor: number, now: Date): QueueEntry[] {
  const answered = queue.slice(0, cursor);
  const pending = queue.slice(cursor).sort((a, b) => compareQueueEntries(a, b, now));
  return [...answered, ...pending];
}

export function toQueueEntry(
  item: LearningItem,
  source: QueueEntrySource,
  now: Date,
  state?: ReviewState | null
): QueueEntry {
  return {
    itemId: item.id,
    skillDomains: [...item.skillDomains],
    baseDifficulty: item.baseDifficulty,
    payloadRef: item.payloadRef,
    nextDueAt: state ? state.nextDueAt : now,
    stability: state ? state.stability : 0,
    source,
  };
}

export function toLearningItem(entry: QueueEntry): LearningItem {
  return {
    id: entry.itemId,
    skillDomains: [...entry.skillDomains],
    baseDifficulty: entry.baseDifficulty,
    payloadRef: entry.payloadRef,
  };
}
