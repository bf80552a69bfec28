/**
 * Database Seed Runner
 *
 * Loads the learning-item catalog from data/learning-items.json into the
 * learning_items table. Idempotent: existing ids are left alone unless
 * --force is given, in which case they are overwritten with the file's
 * values. Review states are never touched.
 *
 * Usage:
 *   npm run db:seed           # Insert missing items
 *   npm run db:seed -- --force  # Also overwrite existing items
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { openDatabase, type AppDatabase } from './db';
import { LearningItemRepository } from './repositories';
import type { LearningItem } from '@/core/models';
import { config } from '../config';

export const DEFAULT_SEED_FILE = fileURLToPath(
  new URL('../../data/learning-items.json', import.meta.url)
);

const seedItemSchema = z.object({
  id: z.string().min(1),
  skillDomains: z.array(z.string().min(1)).min(1),
  baseDifficulty: z.number().positive(),
  payloadRef: z.string().min(1),
});

const seedFileSchema = z.array(seedItemSchema);

export interface SeedResult {
  created: number;
  updated: number;
  skipped: number;
}

/**
 * Reads and validates a seed file.
 *
 * @throws {z.ZodError} If any entry is malformed
 */
export function loadSeedItems(path: string = DEFAULT_SEED_FILE): LearningItem[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return seedFileSchema.parse(raw);
}

export async function seedLearningItems(
  db: AppDatabase,
  items: LearningItem[],
  options: { force?: boolean } = {}
): Promise<SeedResult> {
  const repo = new LearningItemRepository(db);
  const existing = new Set((await repo.findByIds(items.map((i) => i.id))).map((i) => i.id));

  const fresh = items.filter((item) => !existing.has(item.id));
  const created = await repo.createMany(fresh);

  let updated = 0;
  if (options.force) {
    for (const item of items.filter((i) => existing.has(i.id))) {
      const { id, ...changes } = item;
      await repo.update(id, changes);
      updated++;
    }
  }

  return { created, updated, skipped: items.length - created - updated };
}

async function main(): Promise<void> {
  const force = process.argv.slice(2).includes('--force');
  const { db, sqlite } = openDatabase(config.database.path, { migrate: true });

  try {
    console.log(`[seed] Loading ${DEFAULT_SEED_FILE}`);
    const items = loadSeedItems();
    const result = await seedLearningItems(db, items, { force });
    console.log(
      `[seed] ${result.created} created, ${result.updated} updated, ${result.skipped} skipped`
    );
  } finally {
    sqlite.close();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('[seed] Seeding failed:', error);
    process.exitCode = 1;
  });
}
