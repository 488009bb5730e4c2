import { eq } from 'drizzle-orm';
import type { Database } from '../config/database.js';
import { CART_ITEMS_PRIMARY_KEY, users, cartItems } from '../db/schema/index.js';
import { cloneUser, type CartItem, type User } from '../domain/index.js';
import { ConflictError, isUniqueViolation, violatedConstraint } from '../utils/errors.js';
import type { UserRepository } from './types.js';

export type UserRow = typeof users.$inferSelect;
export type CartItemRow = typeof cartItems.$inferSelect;

export function toCartItem(row: CartItemRow): CartItem {
  return {
    userId: row.userId,
    itemId: row.itemId,
    quantity: row.quantity,
  };
}

export function toUser(row: UserRow, cart: CartItem[]): User {
  return {
    id: row.id,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    hashedPassword: row.hashedPassword,
    shippingAddress: row.shippingAddress,
    cartItems: cart,
  };
}

/**
 * PostgreSQL-backed user repository.
 * A user and their cart are written together in one transaction.
 */
export function createDrizzleUserRepository(db: Database): UserRepository {
  async function findCartItems(userId: string): Promise<CartItem[]> {
    const rows = await db
      .select()
      .from(cartItems)
      .where(eq(cartItems.userId, userId));

    return rows.map(toCartItem);
  }

  async function withCart(row: UserRow | undefined): Promise<User | null> {
    if (!row) {
      return null;
    }
    return toUser(row, await findCartItems(row.id));
  }

  return {
    async save(user) {
      const profile = {
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        hashedPassword: user.hashedPassword,
        shippingAddress: user.shippingAddress,
      };

      try {
        await db.transaction(async (tx) => {
          await tx
            .insert(users)
            .values({ id: user.id, ...profile })
            .onConflictDoUpdate({ target: users.id, set: profile });

          // Replace the stored cart with the one on the entity
          await tx.delete(cartItems).where(eq(cartItems.userId, user.id));

          if (user.cartItems.length > 0) {
            await tx.insert(cartItems).values(
              user.cartItems.map((cartItem) => ({
                userId: cartItem.userId,
                itemId: cartItem.itemId,
                quantity: cartItem.quantity,
              }))
            );
          }
        });
      } catch (err) {
        if (isUniqueViolation(err)) {
          // A concurrent add of the same item lands on the cart key
          if (violatedConstraint(err) === CART_ITEMS_PRIMARY_KEY) {
            throw new ConflictError('Item already in cart');
          }
          throw new ConflictError('An user with this email already exists');
        }
        throw err;
      }

      return cloneUser(user);
    },

    async findByEmail(email) {
      const [row] = await db
        .select()
        .from(users)
        .where(eq(users.email, email))
        .limit(1);

      return withCart(row);
    },

    async findById(id) {
      const [row] = await db
        .select()
        .from(users)
        .where(eq(users.id, id))
        .limit(1);

      return withCart(row);
    },

    findCartItems,
  };
}
