import type { Database } from '../config/database.js';
import type { StorageDriver } from '../config/env.js';
import { InternalError } from '../utils/errors.js';
import { createDrizzleItemRepository } from './item.repository.js';
import { createDrizzleUserRepository } from './user.repository.js';
import { createInMemoryItemRepository } from './in-memory-item.repository.js';
import { createInMemoryUserRepository } from './in-memory-user.repository.js';
import type { Repositories } from './types.js';

export type {
  ItemRepository,
  UserRepository,
  ItemCatalog,
  Repositories,
} from './types.js';
export { createDrizzleItemRepository } from './item.repository.js';
export { createDrizzleUserRepository } from './user.repository.js';
export { createInMemoryItemRepository } from './in-memory-item.repository.js';
export { createInMemoryUserRepository } from './in-memory-user.repository.js';
export { createRepositoryItemCatalog } from './item-catalog.js';

export function createInMemoryRepositories(): Repositories {
  return {
    items: createInMemoryItemRepository(),
    users: createInMemoryUserRepository(),
  };
}

/**
 * Build the repositories for the configured storage driver.
 * The postgres driver needs a live database handle.
 */
export function createRepositories(driver: StorageDriver, db: Database | null): Repositories {
  if (driver === 'memory') {
    return createInMemoryRepositories();
  }

  if (!db) {
    throw new InternalError('Database not available', { driver });
  }

  return {
    items: createDrizzleItemRepository(db),
    users: createDrizzleUserRepository(db),
  };
}
