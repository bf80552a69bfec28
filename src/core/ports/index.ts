/**
 * Collaborator Contracts
 *
 * Narrow interfaces the engine consumes or produces to. Storage, HTTP and
 * LLM adapters implement these; tests substitute in-process fakes.
 */

export type {
  DurableStore,
  CompareAndSwapResult,
  InteractionLogRecord,
} from './durable-store';

export type { ContentService, ContentQuery } from './content-service';

export type { AnalyticsSink, AnalyticsRecord, AnalyticsRecordType } from './analytics-sink';

export type { TutoringService, TutorPromptRequest } from './tutoring-service';
