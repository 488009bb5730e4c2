import type { CreateItemInput } from '../../services/index.js';

/**
 * Sample catalogue for local development
 */
export const itemSeedData: CreateItemInput[] = [
  {
    name: 'Paper Notebook',
    description: 'A5, 96 dotted pages',
    price: '4.50',
    quantity: 120,
  },
  {
    name: 'Fountain Pen',
    description: 'Steel nib, medium',
    price: '24.90',
    quantity: 35,
  },
  {
    name: 'Desk Lamp',
    description: null,
    price: '39.00',
    quantity: 12,
  },
  {
    name: 'Canvas Tote',
    description: 'Natural cotton',
    price: '9.99',
    quantity: 0,
  },
];
