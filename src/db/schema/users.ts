import { pgTable, uuid, varchar } from 'drizzle-orm/pg-core';

/**
 * Users table - shop customers, one account per email
 */
export const USERS_EMAIL_UNIQUE = 'users_email_unique';

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).unique(USERS_EMAIL_UNIQUE).notNull(),
  firstName: varchar('first_name', { length: 255 }).notNull(),
  lastName: varchar('last_name', { length: 255 }).notNull(),
  hashedPassword: varchar('hashed_password', { length: 255 }).notNull(),
  shippingAddress: varchar('shipping_address', { length: 512 }),
});
