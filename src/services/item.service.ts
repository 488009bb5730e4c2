import { createItem, type Item } from '../domain/index.js';
import type { ItemRepository } from '../repositories/index.js';
import { ConflictError } from '../utils/errors.js';

export interface CreateItemInput {
  name: string;
  description?: string | null;
  price: string;
  quantity: number;
}

export interface ItemServiceDeps {
  itemRepository: ItemRepository;
}

export function createItemService({ itemRepository }: ItemServiceDeps) {
  return {
    /**
     * Add an item to the catalogue. Names are unique.
     * Throws ConflictError if an item with the same name exists.
     */
    async createItem(input: CreateItemInput): Promise<Item> {
      const existing = await itemRepository.findByName(input.name);
      if (existing) {
        throw new ConflictError('An item with this name already exists');
      }

      const item = createItem({
        id: crypto.randomUUID(),
        name: input.name,
        description: input.description ?? null,
        price: input.price,
        quantity: input.quantity,
      });

      return itemRepository.save(item);
    },

    async listItems(): Promise<Item[]> {
      return itemRepository.getAll();
    },
  };
}

export type ItemService = ReturnType<typeof createItemService>;
