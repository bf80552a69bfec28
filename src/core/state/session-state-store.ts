/**
 * Session State Store - Two-Tier Session Storage
 *
 * The fast tier is an in-process map and is authoritative while a session
 * is live: a `get` after a `put` always sees the put. Every `put` (and every
 * event-log append) is also queued as a write-behind to the Durable Store.
 * Writes for one session run strictly in the order they were queued; writes
 * for different sessions are independent.
 *
 * Eviction is a barrier: `evict` waits for the session's queued writes,
 * re-attempts anything that failed, and only then drops the fast-tier
 * entry. If the durable tier still refuses, the entry stays.
 *
 * Durable writes retry with exponential backoff. When retries run out the
 * session is flagged degraded; the flag clears when a later flush lands.
 *
 * Values crossing the tier boundary are deep-copied with structuredClone,
 * so no caller ever holds a reference into the fast tier.
 */

import type { SessionContext } from '../models';
import type { DurableStore, InteractionLogRecord } from '../ports';
import { StoreUnavailableError } from '../errors';
import { KeyedMutex } from './keyed-mutex';
import { sleep } from '../async';
import { DEFAULT_STORE_CONFIG, type StoreConfig } from '../../config';

interface StoreEntry {
  context: SessionContext;
  lastAccessMs: number;
  /** Tail of this session's ordered write-behind queue */
  writeChain: Promise<void>;
  /** Latest snapshot did not reach the durable tier */
  contextDirty: boolean;
  /** Event appends whose write-behind failed, oldest first */
  failedEvents: InteractionLogRecord[];
}

export interface SessionStateStoreDependencies {
  durable: DurableStore;
  /** Clock used for idle tracking; defaults to the system clock */
  now?: () => Date;
}

/**
 * Two-tier store for SessionContexts.
 *
 * @example
 * ```typescript
 * const store = new SessionStateStore({ durable: new SqliteDurableStore(db) });
 *
 * await store.withSession(ctx.id, async () => {
 *   const current = await store.get(ctx.id);
 *   // ...mutate a copy...
 *   store.put(ctx.id, updated);
 * });
 *
 * await store.evict(ctx.id); // flushes first
 * ```
 */
export class SessionStateStore {
  private readonly entries = new Map<string, StoreEntry>();
  private readonly loading = new Map<string, Promise<SessionContext | null>>();
  private readonly mutex = new KeyedMutex();
  private readonly durable: DurableStore;
  private readonly now: () => Date;
  private readonly config: StoreConfig;

  constructor(deps: SessionStateStoreDependencies, config: Partial<StoreConfig> = {}) {
    this.durable = deps.durable;
    this.now = deps.now ?? (() => new Date());
    this.config = { ...DEFAULT_STORE_CONFIG, ...config };
  }

  /**
   * Returns a copy of the session, reading through to the durable tier on a
   * fast-tier miss. Null when neither tier knows the session.
   *
   * @throws {StoreUnavailableError} If the read-through fails
   */
  async get(sessionId: string): Promise<SessionContext | null> {
    const entry = this.entries.get(sessionId);
    if (entry) {
      entry.lastAccessMs = this.now().getTime();
      return structuredClone(entry.context);
    }

    const pending = this.loading.get(sessionId);
    if (pending) {
      const loaded = await pending;
      return loaded === null ? null : structuredClone(loaded);
    }

    const load = this.readThrough(sessionId);
    this.loading.set(sessionId, load);
    try {
      const loaded = await load;
      return loaded === null ? null : structuredClone(loaded);
    } finally {
      this.loading.delete(sessionId);
    }
  }

  /**
   * Replaces the session in the fast tier and queues a durable write.
   */
  put(sessionId: string, ctx: SessionContext): void {
    const snapshot = structuredClone(ctx);
    const entry = this.entries.get(sessionId);

    if (entry) {
      // The degraded flag is owned by the store, not by callers
      snapshot.degraded = entry.context.degraded;
      entry.context = snapshot;
      entry.lastAccessMs = this.now().getTime();
    } else {
      this.entries.set(sessionId, this.createEntry(snapshot));
    }

    this.enqueueContextWrite(sessionId);
  }

  /**
   * Queues an event-log append behind the session's pending writes.
   */
  enqueueEventAppend(sessionId: string, record: InteractionLogRecord): void {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      throw new Error(`Session '${sessionId}' is not resident in the fast tier`);
    }

    const copy = structuredClone(record);
    this.chain(entry, async () => {
      const ok = await this.writeWithRetry(sessionId, 'event append', () =>
        this.durable.appendInteraction(copy)
      );
      if (!ok) {
        entry.failedEvents.push(copy);
        this.markDegraded(entry);
      }
    });
  }

  /**
   * Waits for the session's queued writes, then retries anything that
   * failed. Clears the degraded flag once everything has landed.
   *
   * @throws {StoreUnavailableError} If the durable tier still refuses
   */
  async flush(sessionId: string): Promise<void> {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return;
    }

    await entry.writeChain;

    while (entry.failedEvents.length > 0) {
      const record = entry.failedEvents[0];
      const ok = await this.writeWithRetry(sessionId, 'event append', () =>
        this.durable.appendInteraction(record)
      );
      if (!ok) {
        throw new StoreUnavailableError(`Could not flush event log for session '${sessionId}'`);
      }
      entry.failedEvents.shift();
    }

    if (entry.contextDirty || entry.context.degraded) {
      const snapshot = structuredClone(entry.context);
      snapshot.degraded = false;
      const ok = await this.writeWithRetry(sessionId, 'context write', () =>
        this.durable.putSessionContext(snapshot)
      );
      if (!ok) {
        throw new StoreUnavailableError(`Could not flush session '${sessionId}'`);
      }
      entry.contextDirty = false;
      if (entry.context.degraded) {
        entry.context.degraded = false;
        console.log(`[SessionStateStore] Session ${sessionId} recovered from degraded mode`);
      }
    }
  }

  /**
   * Flushes, then removes the session from the fast tier. The next `get`
   * reads through from the durable tier.
   *
   * @throws {StoreUnavailableError} If the flush fails; the entry is kept
   */
  async evict(sessionId: string): Promise<void> {
    await this.flush(sessionId);
    this.entries.delete(sessionId);
  }

  /**
   * Runs `fn` exclusively for this session. Operations on other sessions
   * are not blocked.
   */
  withSession<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(sessionId, fn);
  }

  isResident(sessionId: string): boolean {
    return this.entries.has(sessionId);
  }

  /**
   * Flags a resident session as degraded after a durable write outside the
   * store (a review-state write) gave up.
   */
  markSessionDegraded(sessionId: string): void {
    const entry = this.entries.get(sessionId);
    if (entry) {
      this.markDegraded(entry);
    }
  }

  isDegraded(sessionId: string): boolean {
    return this.entries.get(sessionId)?.context.degraded ?? false;
  }

  /**
   * Resident sessions untouched for at least `idleMs` as of `asOf`.
   */
  listIdle(idleMs: number, asOf: Date = this.now()): string[] {
    const cutoff = asOf.getTime() - idleMs;
    return [...this.entries.entries()]
      .filter(([, entry]) => entry.lastAccessMs <= cutoff)
      .map(([sessionId]) => sessionId);
  }

  residentSessionIds(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Flushes every resident session. Failures are logged and skipped.
   */
  async flushAll(): Promise<void> {
    for (const sessionId of this.residentSessionIds()) {
      try {
        await this.flush(sessionId);
      } catch (error) {
        console.error(`[SessionStateStore] Flush failed for session ${sessionId}:`, error);
      }
    }
  }

  private async readThrough(sessionId: string): Promise<SessionContext | null> {
    let loaded: SessionContext | null;
    try {
      loaded = await this.durable.getSessionContext(sessionId);
    } catch (error) {
      throw new StoreUnavailableError(`Read-through failed for session '${sessionId}'`, error);
    }

    if (loaded === null) {
      return null;
    }

    // A put may have landed while the read was in flight
    const resident = this.entries.get(sessionId);
    if (resident) {
      return resident.context;
    }

    const entry = this.createEntry(loaded);
    this.entries.set(sessionId, entry);
    return entry.context;
  }

  private createEntry(context: SessionContext): StoreEntry {
    return {
      context,
      lastAccessMs: this.now().getTime(),
      writeChain: Promise.resolve(),
      contextDirty: false,
      failedEvents: [],
    };
  }

  private enqueueContextWrite(sessionId: string): void {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return;
    }

    const snapshot = structuredClone(entry.context);
    this.chain(entry, async () => {
      const ok = await this.writeWithRetry(sessionId, 'context write', () =>
        this.durable.putSessionContext(snapshot)
      );
      if (ok) {
        entry.contextDirty = false;
      } else {
        entry.contextDirty = true;
        this.markDegraded(entry);
      }
    });
  }

  /**
   * Appends a step to the entry's write queue. Steps never reject, so one
   * failure does not stall the queue behind it.
   */
  private chain(entry: StoreEntry, step: () => Promise<void>): void {
    entry.writeChain = entry.writeChain.then(step).catch((error: unknown) => {
      console.error('[SessionStateStore] Write-behind step failed unexpectedly:', error);
    });
  }

  /**
   * Runs `write` up to 1 + maxWriteRetries times with exponential backoff.
   * Resolves false when every attempt failed.
   */
  private async writeWithRetry(
    sessionId: string,
    label: string,
    write: () => Promise<void>
  ): Promise<boolean> {
    const attempts = this.config.maxWriteRetries + 1;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        await write();
        return true;
      } catch (error) {
        if (attempt === attempts - 1) {
          console.error(
            `[SessionStateStore] ${label} for session ${sessionId} failed after ${attempts} attempts:`,
            error
          );
          return false;
        }
        await sleep(this.config.retryBaseDelayMs * Math.pow(2, attempt));
      }
    }

    return false;
  }

  private markDegraded(entry: StoreEntry): void {
    if (!entry.context.degraded) {
      entry.context.degraded = true;
      console.warn(`[SessionStateStore] Session ${entry.context.id} is degraded (read-only)`);
    }
  }
}
