/**
 * Tutoring Service Contract
 *
 * Optional free-text responder that phrases the prompt for the next item.
 * The engine keeps no conversational state for it; every request carries
 * what the tutor needs.
 */

import type { ControllerState, LearningItem, Outcome } from '../models';

export interface TutorPromptRequest {
  item: LearningItem;
  /** Controller state of the item's first domain */
  domainState: ControllerState;
  /** Outcome of the interaction that led here, if any */
  previousOutcome?: Outcome;
}

export interface TutoringService {
  composePrompt(request: TutorPromptRequest): Promise<string>;
}
