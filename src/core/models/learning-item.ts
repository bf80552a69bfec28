/**
 * LearningItem Domain Types
 *
 * A LearningItem is one unit of reviewable content: a vocabulary card, a
 * grammar drill, a short problem. Items are authored and owned by the
 * Content Service; the engine only reads them and never mutates one.
 *
 * Items are tagged with one or more skill domains ("greetings",
 * "past-tense", ...). The Adaptive Controller tracks effectiveness per
 * domain, so the tags decide which feedback loops an interaction feeds.
 */

/**
 * Immutable reviewable content unit.
 */
export interface LearningItem {
  /** Unique identifier (format: item_[uuid] or a catalog slug) */
  id: string;

  /** Skill domain tags; always at least one */
  skillDomains: string[];

  /**
   * Authored difficulty weight on the same scale as the scheduler's
   * difficulty factor (0.3 easiest to 5.0 hardest).
   */
  baseDifficulty: number;

  /** Opaque reference the Content Service resolves to the renderable payload */
  payloadRef: string;
}

/**
 * Inclusive difficulty window used when asking the Content Service for
 * remediation or escalation material.
 */
export interface DifficultyRange {
  min: number;
  max: number;
}
