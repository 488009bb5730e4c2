import type { ItemRepository } from '../../repositories/index.js';
import { createItemService } from '../../services/index.js';
import { ConflictError } from '../../utils/errors.js';
import { itemSeedData } from './items.js';

/**
 * Insert the sample catalogue. Items whose name already exists are skipped,
 * so seeding is safe to re-run.
 */
export async function seedItems(itemRepository: ItemRepository): Promise<number> {
  const items = createItemService({ itemRepository });
  let inserted = 0;

  for (const item of itemSeedData) {
    try {
      await items.createItem(item);
      inserted++;
      console.log(`   ✓ ${item.name}`);
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      console.log(`   - ${item.name} (already present)`);
    }
  }

  return inserted;
}
