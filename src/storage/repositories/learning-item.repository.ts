/**
 * LearningItem Repository Implementation
 *
 * Data access for the content catalog. Skill domains are stored as a JSON
 * array, so domain filtering goes through SQLite's json_each.
 */

import { and, asc, eq, gte, inArray, lte, notInArray, sql, type SQL } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { learningItems } from '../schema';
import type { LearningItem } from '@/core/models';

export type CreateLearningItemInput = LearningItem;

export type UpdateLearningItemInput = Partial<Omit<LearningItem, 'id'>>;

export interface LearningItemQuery {
  domain?: string;
  minDifficulty?: number;
  maxDifficulty?: number;
  excludeIds?: string[];
  limit?: number;
}

function mapToDomain(row: typeof learningItems.$inferSelect): LearningItem {
  return {
    id: row.id,
    skillDomains: row.skillDomains,
    baseDifficulty: row.baseDifficulty,
    payloadRef: row.payloadRef,
  };
}

/**
 * Repository for LearningItem data access operations.
 *
 * @example
 * ```typescript
 * const repo = new LearningItemRepository(db);
 * const easier = await repo.findByQuery({
 *   domain: 'greetings',
 *   maxDifficulty: 2.0,
 *   excludeIds: ['item_hello'],
 *   limit: 3,
 * });
 * ```
 */
export class LearningItemRepository {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<LearningItem | null> {
    const result = await this.db
      .select()
      .from(learningItems)
      .where(eq(learningItems.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Looks up several items at once. Unknown ids are skipped.
   */
  async findByIds(ids: string[]): Promise<LearningItem[]> {
    if (ids.length === 0) {
      return [];
    }
    const results = await this.db
      .select()
      .from(learningItems)
      .where(inArray(learningItems.id, ids));
    return results.map(mapToDomain);
  }

  /**
   * Filters the catalog by domain tag, difficulty window and exclusions.
   * Results are ordered by difficulty, then id.
   */
  async findByQuery(query: LearningItemQuery): Promise<LearningItem[]> {
    const conditions: SQL[] = [];

    if (query.domain !== undefined) {
      conditions.push(
        sql`exists (select 1 from json_each(${learningItems.skillDomains}) where json_each.value = ${query.domain})`
      );
    }
    if (query.minDifficulty !== undefined) {
      conditions.push(gte(learningItems.baseDifficulty, query.minDifficulty));
    }
    if (query.maxDifficulty !== undefined) {
      conditions.push(lte(learningItems.baseDifficulty, query.maxDifficulty));
    }
    if (query.excludeIds && query.excludeIds.length > 0) {
      conditions.push(notInArray(learningItems.id, query.excludeIds));
    }

    const base = this.db
      .select()
      .from(learningItems)
      .where(and(...conditions))
      .orderBy(asc(learningItems.baseDifficulty), asc(learningItems.id));

    const results = query.limit !== undefined ? await base.limit(query.limit) : await base;
    return results.map(mapToDomain);
  }

  /**
   * Inserts items, leaving existing ids untouched. Returns how many were new.
   */
  async createMany(inputs: CreateLearningItemInput[]): Promise<number> {
    if (inputs.length === 0) {
      return 0;
    }
    const createdAt = new Date();
    const result = await this.db
      .insert(learningItems)
      .values(inputs.map((input) => ({ ...input, createdAt })))
      .onConflictDoNothing()
      .returning({ id: learningItems.id });
    return result.length;
  }

  async update(id: string, input: UpdateLearningItemInput): Promise<LearningItem> {
    const result = await this.db
      .update(learningItems)
      .set(input)
      .where(eq(learningItems.id, id))
      .returning();

    if (result.length === 0) {
      throw new Error(`LearningItem with id '${id}' not found`);
    }

    return mapToDomain(result[0]);
  }
}
