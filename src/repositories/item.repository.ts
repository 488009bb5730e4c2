import { eq } from 'drizzle-orm';
import type { Database } from '../config/database.js';
import { items } from '../db/schema/index.js';
import type { Item } from '../domain/index.js';
import { ConflictError, InternalError, isUniqueViolation } from '../utils/errors.js';
import type { ItemRepository } from './types.js';

export type ItemRow = typeof items.$inferSelect;

export function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price,
    quantity: row.quantity,
  };
}

/**
 * PostgreSQL-backed item repository
 */
export function createDrizzleItemRepository(db: Database): ItemRepository {
  return {
    async save(item) {
      try {
        const [row] = await db
          .insert(items)
          .values({
            id: item.id,
            name: item.name,
            description: item.description,
            price: item.price,
            quantity: item.quantity,
          })
          .onConflictDoUpdate({
            target: items.id,
            set: {
              name: item.name,
              description: item.description,
              price: item.price,
              quantity: item.quantity,
            },
          })
          .returning();

        if (!row) {
          throw new InternalError('Item was not persisted', { id: item.id });
        }

        return toItem(row);
      } catch (err) {
        // Lost a race with a concurrent insert of the same name
        if (isUniqueViolation(err)) {
          throw new ConflictError('An item with this name already exists');
        }
        throw err;
      }
    },

    async findByName(name) {
      const [row] = await db
        .select()
        .from(items)
        .where(eq(items.name, name))
        .limit(1);

      return row ? toItem(row) : null;
    },

    async findById(id) {
      const [row] = await db
        .select()
        .from(items)
        .where(eq(items.id, id))
        .limit(1);

      return row ? toItem(row) : null;
    },

    async getAll() {
      const rows = await db.select().from(items);
      return rows.map(toItem);
    },
  };
}
