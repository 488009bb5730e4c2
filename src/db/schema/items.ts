import { pgTable, uuid, varchar, text, numeric, integer } from 'drizzle-orm/pg-core';

/**
 * Items table - the shop catalogue.
 * Price is stored as an exact decimal and read back as a string.
 */
export const items = pgTable('items', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 255 }).unique().notNull(),
  description: text('description'),
  price: numeric('price', { precision: 12, scale: 2 }).notNull().default('0'),
  quantity: integer('quantity').notNull().default(0),
});
