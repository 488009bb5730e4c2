import { createRepositoryItemCatalog, type Repositories } from '../repositories/index.js';
import { createItemService, type ItemService } from './item.service.js';
import { createUserService, type UserService } from './user.service.js';
import { createCartService, type CartService } from './cart.service.js';

export { createItemService, type ItemService, type CreateItemInput } from './item.service.js';
export { createUserService, type UserService, type CreateUserInput } from './user.service.js';
export { createCartService, type CartService, type AddToCartInput } from './cart.service.js';

export interface Services {
  items: ItemService;
  users: UserService;
  cart: CartService;
}

/**
 * Wire the services over a set of repositories.
 */
export function createServices(repositories: Repositories): Services {
  return {
    items: createItemService({ itemRepository: repositories.items }),
    users: createUserService({ userRepository: repositories.users }),
    cart: createCartService({
      userRepository: repositories.users,
      itemCatalog: createRepositoryItemCatalog(repositories.items),
    }),
  };
}
