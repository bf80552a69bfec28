/**
 * Repository Layer - Barrel Export
 *
 * Drizzle-backed data access, one class per table. Business logic talks to
 * the SqliteDurableStore and CatalogContentService adapters, which compose
 * these repositories behind the engine's collaborator contracts.
 *
 * @example
 * ```typescript
 * import { LearningItemRepository, ReviewStateRepository } from '@/storage/repositories';
 *
 * const items = new LearningItemRepository(db);
 * const reviews = new ReviewStateRepository(db);
 * ```
 */

export {
  LearningItemRepository,
  type CreateLearningItemInput,
  type UpdateLearningItemInput,
  type LearningItemQuery,
} from './learning-item.repository';

export { ReviewStateRepository } from './review-state.repository';

export { SessionContextRepository } from './session-context.repository';

export { InteractionEventRepository } from './interaction-event.repository';

export {
  AnalyticsEventRepository,
  type StoredAnalyticsEvent,
  type CreateAnalyticsEventInput,
} from './analytics-event.repository';
