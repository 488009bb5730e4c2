import { ValidationError } from '../utils/errors.js';

/**
 * A catalogue entry. `price` is an exact decimal kept as text
 * (e.g. "19.99") so no precision is lost between the API and PostgreSQL.
 */
export interface Item {
  id: string;
  name: string;
  description: string | null;
  price: string;
  quantity: number;
}

/** Largest value a PostgreSQL `integer` column holds. */
export const MAX_QUANTITY = 2147483647;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// numeric(12, 2): ten digits before the point, two after
const STORED_PRICE_PATTERN = /^\d{1,10}\.\d{2}$/;

export function isDecimalString(value: string): boolean {
  return DECIMAL_PATTERN.test(value);
}

export function isNegativeDecimal(value: string): boolean {
  return value.startsWith('-') && /[1-9]/.test(value);
}

/**
 * Canonical form of a non-negative decimal string: no sign, no leading
 * zeros and at least two fraction digits ("007.5" becomes "7.50").
 */
export function normalizePrice(value: string): string {
  const [whole = '0', fraction = ''] = value.replace(/^-/, '').split('.');

  return `${whole.replace(/^0+(?=\d)/, '')}.${fraction.padEnd(2, '0')}`;
}

/**
 * First reason a price cannot be stored, or null when it can.
 */
export function priceProblem(value: string): string | null {
  if (!isDecimalString(value)) {
    return 'Price must be a decimal number';
  }
  if (isNegativeDecimal(value)) {
    return 'Price cannot be negative';
  }
  if (!STORED_PRICE_PATTERN.test(normalizePrice(value))) {
    return 'Price must have at most 10 digits before the decimal point and 2 after it';
  }
  return null;
}

/**
 * Build an Item, enforcing the catalogue invariants.
 * The price is returned in canonical form, as PostgreSQL reads it back.
 */
export function createItem(props: Item): Item {
  const problem = priceProblem(props.price);
  if (problem) {
    throw new ValidationError(problem, { price: props.price });
  }
  if (!Number.isInteger(props.quantity) || props.quantity < 0) {
    throw new ValidationError('Quantity cannot be negative', { quantity: props.quantity });
  }
  if (props.quantity > MAX_QUANTITY) {
    throw new ValidationError('Quantity is too large', { quantity: props.quantity });
  }

  return { ...props, price: normalizePrice(props.price) };
}
