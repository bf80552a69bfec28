/**
 * Session Module
 *
 * The Session Orchestrator is the engine's public contract; the pipeline
 * and queue helpers are exported for tests and for callers that compose
 * their own orchestration.
 *
 * @example
 * ```typescript
 * import { SessionOrchestrator, type InteractResponse } from '@/core/session';
 * ```
 */

export {
  SessionOrchestrator,
  type SessionOrchestratorDependencies,
  type SessionOrchestratorConfig,
} from './session-orchestrator';

export {
  InteractionPipeline,
  type InteractionPipelineDependencies,
  type InteractionPipelineConfig,
} from './interaction-pipeline';

export {
  sortPending,
  compareQueueEntries,
  isInjected,
  toQueueEntry,
  toLearningItem,
} from './queue';

export {
  rollingAccuracy,
  learningVelocity,
  difficultyProgression,
  estimateMasteryMs,
} from './summary-metrics';

export type {
  StartSessionOptions,
  InteractionResult,
  PipelineOutcome,
  InteractResponse,
  DomainSummary,
  SessionSummary,
} from './types';
