/**
 * Scheduler Module
 *
 * @example
 * ```typescript
 * import { ItemScheduler, RetentionEstimator } from '@/core/scheduler';
 * ```
 */

export { ItemScheduler, DAY_MS } from './item-scheduler';
export { RetentionEstimator } from './retention';
