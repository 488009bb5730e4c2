import { cloneUser, type User } from '../domain/index.js';
import type { UserRepository } from './types.js';

/**
 * Map-backed user repository; see createInMemoryItemRepository.
 */
export function createInMemoryUserRepository(): UserRepository {
  const store = new Map<string, User>();

  return {
    async save(user) {
      store.set(user.id, cloneUser(user));
      return cloneUser(user);
    },

    async findByEmail(email) {
      for (const user of store.values()) {
        if (user.email === email) {
          return cloneUser(user);
        }
      }
      return null;
    },

    async findById(id) {
      const user = store.get(id);
      return user ? cloneUser(user) : null;
    },

    async findCartItems(userId) {
      const user = store.get(userId);
      return user ? user.cartItems.map((cartItem) => ({ ...cartItem })) : [];
    },
  };
}
