/**
 * Session State Module
 *
 * @example
 * ```typescript
 * import { SessionStateStore } from '@/core/state';
 * ```
 */

export { SessionStateStore, type SessionStateStoreDependencies } from './session-state-store';
export { KeyedMutex } from './keyed-mutex';
