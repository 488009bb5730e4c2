import type { ItemCatalog, ItemRepository } from './types.js';

/**
 * ItemCatalog over the item repository. Stock is sufficient when the item
 * exists and holds at least the requested quantity.
 */
export function createRepositoryItemCatalog(itemRepository: ItemRepository): ItemCatalog {
  return {
    getItem(itemId) {
      return itemRepository.findById(itemId);
    },

    async checkStock(itemId, quantity) {
      const item = await itemRepository.findById(itemId);
      return item !== null && item.quantity >= quantity;
    },
  };
}
