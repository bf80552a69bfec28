/**
 * Adaptation Module
 *
 * @example
 * ```typescript
 * import { AdaptiveController, computeSignal } from '@/core/adaptation';
 * ```
 */

export {
  AdaptiveController,
  initialDomainState,
  nextDomainState,
  type AdaptationAction,
  type AdaptationHint,
  type DomainAdaptation,
  type AdaptiveControllerDependencies,
} from './adaptive-controller';

export {
  computeSignal,
  computeSignalComponents,
  appendToWindow,
  replayWindows,
  NEUTRAL_SIGNAL,
  type SignalComponents,
  type SignalConfig,
} from './effectiveness';
