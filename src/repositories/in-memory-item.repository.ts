import type { Item } from '../domain/index.js';
import type { ItemRepository } from './types.js';

/**
 * Map-backed item repository for development without PostgreSQL and for tests.
 * Stores copies, so callers cannot mutate what is stored.
 */
export function createInMemoryItemRepository(): ItemRepository {
  const store = new Map<string, Item>();

  return {
    async save(item) {
      store.set(item.id, { ...item });
      return { ...item };
    },

    async findByName(name) {
      for (const item of store.values()) {
        if (item.name === name) {
          return { ...item };
        }
      }
      return null;
    },

    async findById(id) {
      const item = store.get(id);
      return item ? { ...item } : null;
    },

    async getAll() {
      return [...store.values()].map((item) => ({ ...item }));
    },
  };
}
