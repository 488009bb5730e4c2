import { pgTable, uuid, integer, primaryKey, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { items } from './items.js';

/**
 * Cart Items Table
 *
 * Join table between users and items holding the quantity of each item in a
 * user's cart. The composite primary key allows one entry per user per item.
 */
export const CART_ITEMS_PRIMARY_KEY = 'cart_items_user_id_item_id_pk';

export const cartItems = pgTable(
  'cart_items',
  {
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    itemId: uuid('item_id')
      .notNull()
      .references(() => items.id, { onDelete: 'cascade' }),
    quantity: integer('quantity').notNull().default(0),
  },
  (table) => ({
    pk: primaryKey({ name: CART_ITEMS_PRIMARY_KEY, columns: [table.userId, table.itemId] }),
    userIdIdx: index('cart_items_user_id_idx').on(table.userId),
  })
);
