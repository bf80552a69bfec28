/**
 * Content Service Contract
 *
 * Supplies LearningItems. Results are unordered; callers sort them.
 */

import type { DifficultyRange, LearningItem } from '../models';

export interface ContentQuery {
  domain: string;
  difficultyRange: DifficultyRange;
  excludeIds: string[];
  /** No limit when omitted */
  limit?: number;
}

export interface ContentService {
  fetchItems(query: ContentQuery): Promise<LearningItem[]>;

  /** Looks items up by id; unknown ids are skipped */
  getItems(ids: string[]): Promise<LearningItem[]>;
}
