export type { Item } from './item.js';
export {
  MAX_QUANTITY,
  createItem,
  isDecimalString,
  isNegativeDecimal,
  normalizePrice,
  priceProblem,
} from './item.js';
export type { User, CartItem } from './user.js';
export { createCartItem, cloneUser } from './user.js';
