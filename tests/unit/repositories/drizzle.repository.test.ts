import { describe, it, expect, vi, type Mock } from 'vitest';
import { randomUUID } from 'crypto';
import type { Database } from '../../../src/config/database.js';
import {
  CART_ITEMS_PRIMARY_KEY,
  USERS_EMAIL_UNIQUE,
  cartItems,
  items,
  users,
} from '../../../src/db/schema/index.js';
import {
  createDrizzleItemRepository,
  createDrizzleUserRepository,
} from '../../../src/repositories/index.js';
import { ConflictError } from '../../../src/utils/errors.js';
import { buildCartItem, buildItem, buildUser } from '../../helpers/fixtures.js';

/**
 * The drizzle repositories are exercised against chained query-builder
 * stand-ins; only the calls the repository makes are modelled.
 */
function asDatabase(mock: object): Database {
  return mock as unknown as Database;
}

function uniqueViolation(constraint?: string): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint'), {
    code: '23505',
    constraint,
  });
}

const userRow = {
  id: randomUUID(),
  email: 'jane.doe@example.com',
  firstName: 'Jane',
  lastName: 'Doe',
  hashedPassword: 'hashed-password',
  shippingAddress: '1 Main Street',
};

describe('Drizzle item repository', () => {
  function selectReturning(rows: unknown[]) {
    const limit = vi.fn().mockResolvedValue(rows);
    const where = vi.fn(() => ({ limit }));
    const from = vi.fn(() => ({ where }));
    return { select: vi.fn(() => ({ from })), from, where, limit };
  }

  it('should map the row found by name', async () => {
    const row = buildItem({ name: 'Desk Lamp', price: '39.00' });
    const db = selectReturning([row]);

    const repository = createDrizzleItemRepository(asDatabase(db));

    await expect(repository.findByName('Desk Lamp')).resolves.toEqual(row);
    expect(db.from).toHaveBeenCalledWith(items);
    expect(db.limit).toHaveBeenCalledWith(1);
  });

  it('should return null when no row matches', async () => {
    const repository = createDrizzleItemRepository(asDatabase(selectReturning([])));

    await expect(repository.findById(randomUUID())).resolves.toBeNull();
  });

  it('should list all rows', async () => {
    const rows = [buildItem({ name: 'A' }), buildItem({ name: 'B' })];
    const from = vi.fn().mockResolvedValue(rows);
    const repository = createDrizzleItemRepository(asDatabase({ select: vi.fn(() => ({ from })) }));

    await expect(repository.getAll()).resolves.toEqual(rows);
  });

  describe('save', () => {
    function insertReturning(returning: Mock) {
      const onConflictDoUpdate = vi.fn(() => ({ returning }));
      const values = vi.fn(() => ({ onConflictDoUpdate }));
      return { insert: vi.fn(() => ({ values })), values, onConflictDoUpdate };
    }

    it('should upsert and return the stored row', async () => {
      const item = buildItem({ price: '4.5' });
      const stored = { ...item, price: '4.50' };
      const db = insertReturning(vi.fn().mockResolvedValue([stored]));

      const repository = createDrizzleItemRepository(asDatabase(db));

      await expect(repository.save(item)).resolves.toEqual(stored);
      expect(db.insert).toHaveBeenCalledWith(items);
      expect(db.values).toHaveBeenCalledWith({
        id: item.id,
        name: item.name,
        description: item.description,
        price: '4.5',
        quantity: item.quantity,
      });
    });

    it('should turn a unique violation into ConflictError', async () => {
      const db = insertReturning(vi.fn().mockRejectedValue(uniqueViolation()));
      const repository = createDrizzleItemRepository(asDatabase(db));

      await expect(repository.save(buildItem())).rejects.toThrow(
        new ConflictError('An item with this name already exists')
      );
    });

    it('should rethrow other database errors', async () => {
      const failure = new Error('connection terminated');
      const db = insertReturning(vi.fn().mockRejectedValue(failure));
      const repository = createDrizzleItemRepository(asDatabase(db));

      await expect(repository.save(buildItem())).rejects.toBe(failure);
    });
  });
});

describe('Drizzle user repository', () => {
  function transactional() {
    const onConflictDoUpdate = vi.fn().mockResolvedValue(undefined);
    const values = vi.fn(() => ({ onConflictDoUpdate }));
    const deleteWhere = vi.fn().mockResolvedValue(undefined);
    const tx = {
      insert: vi.fn(() => ({ values })),
      delete: vi.fn(() => ({ where: deleteWhere })),
    };
    const transaction = vi.fn(async (run: (t: typeof tx) => Promise<void>) => run(tx));
    return { db: { transaction }, tx, values, onConflictDoUpdate, deleteWhere };
  }

  it('should write the user and replace the cart in one transaction', async () => {
    const { db, tx, values } = transactional();
    const user = buildUser();
    const cartItem = buildCartItem({ userId: user.id, quantity: 2 });
    const repository = createDrizzleUserRepository(asDatabase(db));

    const saved = await repository.save({ ...user, cartItems: [cartItem] });

    expect(saved).toEqual({ ...user, cartItems: [cartItem] });
    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(tx.insert).toHaveBeenNthCalledWith(1, users);
    expect(tx.delete).toHaveBeenCalledWith(cartItems);
    expect(tx.insert).toHaveBeenNthCalledWith(2, cartItems);
    expect(values).toHaveBeenLastCalledWith([
      { userId: user.id, itemId: cartItem.itemId, quantity: 2 },
    ]);
  });

  it('should not insert cart rows for an empty cart', async () => {
    const { db, tx, deleteWhere } = transactional();
    const repository = createDrizzleUserRepository(asDatabase(db));

    await repository.save(buildUser());

    expect(tx.insert).toHaveBeenCalledTimes(1);
    expect(deleteWhere).toHaveBeenCalledTimes(1);
  });

  it('should turn a duplicate email into ConflictError', async () => {
    const db = { transaction: vi.fn().mockRejectedValue(uniqueViolation(USERS_EMAIL_UNIQUE)) };
    const repository = createDrizzleUserRepository(asDatabase(db));

    await expect(repository.save(buildUser())).rejects.toThrow(
      new ConflictError('An user with this email already exists')
    );
  });

  it('should report a cart key collision as an item already in the cart', async () => {
    const db = { transaction: vi.fn().mockRejectedValue(uniqueViolation(CART_ITEMS_PRIMARY_KEY)) };
    const repository = createDrizzleUserRepository(asDatabase(db));
    const user = buildUser();

    const saving = repository.save({ ...user, cartItems: [buildCartItem({ userId: user.id })] });

    await expect(saving).rejects.toThrow(new ConflictError('Item already in cart'));
  });

  it('should load the cart with the user', async () => {
    const cartRow = { userId: userRow.id, itemId: randomUUID(), quantity: 3 };
    const userChain = {
      from: vi.fn(() => ({
        where: vi.fn(() => ({ limit: vi.fn().mockResolvedValue([userRow]) })),
      })),
    };
    const cartChain = {
      from: vi.fn(() => ({ where: vi.fn().mockResolvedValue([cartRow]) })),
    };
    const select = vi.fn().mockReturnValueOnce(userChain).mockReturnValueOnce(cartChain);
    const repository = createDrizzleUserRepository(asDatabase({ select }));

    const user = await repository.findById(userRow.id);

    expect(user).toEqual({ ...userRow, cartItems: [cartRow] });
    expect(userChain.from).toHaveBeenCalledWith(users);
    expect(cartChain.from).toHaveBeenCalledWith(cartItems);
  });

  it('should return null for an unknown email without reading a cart', async () => {
    const select = vi.fn(() => ({
      from: vi.fn(() => ({
        where: vi.fn(() => ({ limit: vi.fn().mockResolvedValue([]) })),
      })),
    }));
    const repository = createDrizzleUserRepository(asDatabase({ select }));

    await expect(repository.findByEmail('nobody@example.com')).resolves.toBeNull();
    expect(select).toHaveBeenCalledTimes(1);
  });
});
