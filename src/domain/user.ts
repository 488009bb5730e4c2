import { ValidationError } from '../utils/errors.js';
import { MAX_QUANTITY } from './item.js';

export interface CartItem {
  userId: string;
  itemId: string;
  quantity: number;
}

export interface User {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  hashedPassword: string;
  shippingAddress: string | null;
  cartItems: CartItem[];
}

/**
 * Build a cart entry. Quantity must be a positive integer.
 */
export function createCartItem(props: CartItem): CartItem {
  if (!Number.isInteger(props.quantity) || props.quantity <= 0) {
    throw new ValidationError('Quantity must be positive', { quantity: props.quantity });
  }
  if (props.quantity > MAX_QUANTITY) {
    throw new ValidationError('Quantity is too large', { quantity: props.quantity });
  }

  return { ...props };
}

/**
 * Deep copy of a user, cart included.
 */
export function cloneUser(user: User): User {
  return {
    ...user,
    cartItems: user.cartItems.map((cartItem) => ({ ...cartItem })),
  };
}
