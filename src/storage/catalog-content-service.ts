/**
 * Catalog Content Service
 *
 * Content Service backed by the learning_items table. Stands in for a
 * remote content API in single-node deployments and in tests.
 */

import type { AppDatabase } from './db';
import { LearningItemRepository } from './repositories';
import type { LearningItem } from '@/core/models';
import type { ContentQuery, ContentService } from '@/core/ports';

export class CatalogContentService implements ContentService {
  private readonly items: LearningItemRepository;

  constructor(db: AppDatabase) {
    this.items = new LearningItemRepository(db);
  }

  fetchItems(query: ContentQuery): Promise<LearningItem[]> {
    return this.items.findByQuery({
      domain: query.domain,
      minDifficulty: query.difficultyRange.min,
      maxDifficulty: query.difficultyRange.max,
      excludeIds: query.excludeIds,
      limit: query.limit,
    });
  }

  getItems(ids: string[]): Promise<LearningItem[]> {
    return this.items.findByIds(ids);
  }
}
