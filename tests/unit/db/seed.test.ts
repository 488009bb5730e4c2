import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { seedItems } from '../../../src/db/seed/index.js';
import { itemSeedData } from '../../../src/db/seed/items.js';
import { createInMemoryItemRepository } from '../../../src/repositories/index.js';

describe('seedItems', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should insert the sample catalogue', async () => {
    const repository = createInMemoryItemRepository();

    const inserted = await seedItems(repository);

    expect(inserted).toBe(itemSeedData.length);
    const names = (await repository.getAll()).map((item) => item.name);
    expect(names).toEqual(itemSeedData.map((item) => item.name));
  });

  it('should skip items that already exist when re-run', async () => {
    const repository = createInMemoryItemRepository();
    await seedItems(repository);

    const inserted = await seedItems(repository);

    expect(inserted).toBe(0);
    await expect(repository.getAll()).resolves.toHaveLength(itemSeedData.length);
  });
});
