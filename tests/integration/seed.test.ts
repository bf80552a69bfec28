/**
 * Integration Tests: Catalog Seeding
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadSeedItems, seedLearningItems } from '../../src/storage/seed';
import { LearningItemRepository } from '../../src/storage/repositories';
import { createTestDatabase, cleanupTestDatabase, type TestDatabaseContext } from '../setup';

describe('catalog seeding', () => {
  let ctx: TestDatabaseContext;

  beforeEach(() => {
    ctx = createTestDatabase();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  it('loads and validates the bundled catalog', () => {
    const items = loadSeedItems();

    expect(items).toHaveLength(46);
    expect(new Set(items.map((i) => i.id)).size).toBe(46);
    expect(items.find((i) => i.id === 'greetings-hello')).toEqual({
      id: 'greetings-hello',
      skillDomains: ['greetings'],
      baseDifficulty: 0.5,
      payloadRef: 'content://lessons/greetings/hello',
    });
  });

  it('inserts once and skips existing items on a second run', async () => {
    const items = loadSeedItems();

    const first = await seedLearningItems(ctx.db, items);
    const second = await seedLearningItems(ctx.db, items);

    expect(first).toEqual({ created: 46, updated: 0, skipped: 0 });
    expect(second).toEqual({ created: 0, updated: 0, skipped: 46 });
  });

  it('overwrites existing items when forced', async () => {
    const items = loadSeedItems();
    await seedLearningItems(ctx.db, items);

    const edited = items.map((item) =>
      item.id === 'greetings-hello' ? { ...item, baseDifficulty: 0.7 } : item
    );
    const result = await seedLearningItems(ctx.db, edited, { force: true });

    expect(result).toEqual({ created: 0, updated: 46, skipped: 0 });
    const hello = await new LearningItemRepository(ctx.db).findById('greetings-hello');
    expect(hello?.baseDifficulty).toBe(0.7);
  });
});
