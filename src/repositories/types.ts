/**
 * Repository Interfaces
 *
 * Contracts between the services and storage. Implemented over drizzle
 * (PostgreSQL) and in memory; services only ever see these.
 */

import type { Item, User, CartItem } from '../domain/index.js';

export interface ItemRepository {
  /** Insert or replace the item with the same id. */
  save(item: Item): Promise<Item>;
  findByName(name: string): Promise<Item | null>;
  findById(id: string): Promise<Item | null>;
  getAll(): Promise<Item[]>;
}

export interface UserRepository {
  /** Insert or replace the user; the stored cart becomes exactly `user.cartItems`. */
  save(user: User): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  /** Empty for a user that does not exist. */
  findCartItems(userId: string): Promise<CartItem[]>;
}

/**
 * Item lookups the cart needs, kept apart from ItemRepository so the cart
 * does not depend on how the catalogue is stored.
 */
export interface ItemCatalog {
  getItem(itemId: string): Promise<Item | null>;
  checkStock(itemId: string, quantity: number): Promise<boolean>;
}

export interface Repositories {
  items: ItemRepository;
  users: UserRepository;
}
