import { randomUUID } from 'crypto';
import { vi } from 'vitest';
import type { Item, User, CartItem } from '../../src/domain/index.js';
import type { ItemCatalog, ItemRepository, UserRepository } from '../../src/repositories/index.js';

/**
 * Build an item with default values.
 */
export function buildItem(overrides?: Partial<Item>): Item {
  return {
    id: randomUUID(),
    name: 'Desk Lamp',
    description: null,
    price: '39.00',
    quantity: 5,
    ...overrides,
  };
}

/**
 * Build a user with an empty cart by default.
 */
export function buildUser(overrides?: Partial<User>): User {
  return {
    id: randomUUID(),
    email: 'jane.doe@example.com',
    firstName: 'Jane',
    lastName: 'Doe',
    hashedPassword: 'hashed-password',
    shippingAddress: null,
    cartItems: [],
    ...overrides,
  };
}

export function buildCartItem(overrides?: Partial<CartItem>): CartItem {
  return {
    userId: randomUUID(),
    itemId: randomUUID(),
    quantity: 1,
    ...overrides,
  };
}

/**
 * vi.fn-backed repositories for unit-testing services.
 */
export function createMockItemRepository() {
  return {
    save: vi.fn<ItemRepository['save']>(),
    findByName: vi.fn<ItemRepository['findByName']>(),
    findById: vi.fn<ItemRepository['findById']>(),
    getAll: vi.fn<ItemRepository['getAll']>(),
  } satisfies ItemRepository;
}

export function createMockUserRepository() {
  return {
    save: vi.fn<UserRepository['save']>(),
    findByEmail: vi.fn<UserRepository['findByEmail']>(),
    findById: vi.fn<UserRepository['findById']>(),
    findCartItems: vi.fn<UserRepository['findCartItems']>(),
  } satisfies UserRepository;
}

export function createMockItemCatalog() {
  return {
    getItem: vi.fn<ItemCatalog['getItem']>(),
    checkStock: vi.fn<ItemCatalog['checkStock']>(),
  } satisfies ItemCatalog;
}
