/**
 * Database schema barrel export
 */

export * from './items.js';
export * from './users.js';
export * from './cart-items.js';
