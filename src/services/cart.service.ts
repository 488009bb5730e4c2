import { createCartItem, type CartItem } from '../domain/index.js';
import type { ItemCatalog, UserRepository } from '../repositories/index.js';
import { ConflictError } from '../utils/errors.js';

export interface AddToCartInput {
  itemId: string;
  quantity: number;
}

export interface CartServiceDeps {
  userRepository: UserRepository;
  itemCatalog: ItemCatalog;
}

export function createCartService({ userRepository, itemCatalog }: CartServiceDeps) {
  return {
    /**
     * Put an item in a user's cart and return the whole cart.
     *
     * Checked in order: the user exists, the item exists, there is enough
     * stock, the item is not in the cart yet. Every failure is a ConflictError.
     * Stock is checked, not reserved.
     */
    async addItemToCart(userId: string, input: AddToCartInput): Promise<CartItem[]> {
      const user = await userRepository.findById(userId);
      if (!user) {
        throw new ConflictError('User does not exists');
      }

      const item = await itemCatalog.getItem(input.itemId);
      if (!item) {
        throw new ConflictError('Item does not exists');
      }

      const inStock = await itemCatalog.checkStock(input.itemId, input.quantity);
      if (!inStock) {
        throw new ConflictError('Not enough items in stock');
      }

      if (user.cartItems.some((cartItem) => cartItem.itemId === input.itemId)) {
        throw new ConflictError('Item already in cart');
      }

      const cartItem = createCartItem({
        userId,
        itemId: input.itemId,
        quantity: input.quantity,
      });

      const saved = await userRepository.save({
        ...user,
        cartItems: [...user.cartItems, cartItem],
      });

      return saved.cartItems;
    },

    /**
     * Cart contents; empty when the user does not exist.
     */
    async listCartItems(userId: string): Promise<CartItem[]> {
      return userRepository.findCartItems(userId);
    },
  };
}

export type CartService = ReturnType<typeof createCartService>;
