import { createRoute, z } from '@hono/zod-openapi';
import { createRouter, errorResponse, successSchema } from '../config/openapi.js';
import { MAX_QUANTITY, type CartItem, type User } from '../domain/index.js';
import type { CartService, UserService } from '../services/index.js';
import { success } from '../utils/response.js';

export const UserSchema = z
  .object({
    id: z.string().uuid(),
    first_name: z.string(),
    last_name: z.string(),
    email: z.string(),
    shipping_address: z.string().nullable(),
  })
  .openapi('User');

export const CreateUserSchema = z
  .object({
    first_name: z.string().min(1, 'First name is required').max(255),
    last_name: z.string().min(1, 'Last name is required').max(255),
    email: z.string().email('Invalid email address').max(255),
    password: z.string().min(1, 'Password is required'),
    shipping_address: z.string().max(512).nullable().optional(),
  })
  .openapi('CreateUserRequest');

export const CartEntrySchema = z
  .object({
    item_id: z.string().uuid(),
    quantity: z.number().int(),
  })
  .openapi('CartEntry');

export const AddToCartSchema = z
  .object({
    item_id: z.string().uuid(),
    quantity: z
      .number()
      .int()
      .positive('Quantity must be positive')
      .max(MAX_QUANTITY, 'Quantity is too large'),
  })
  .openapi('AddToCartRequest');

export const CartSchema = z
  .object({
    items: z.array(CartEntrySchema),
  })
  .openapi('Cart');

const UserIdParamSchema = z.object({
  user_id: z
    .string()
    .uuid()
    .openapi({ param: { name: 'user_id', in: 'path' } }),
});

// Helper functions to convert domain objects to response DTOs
export function toUserDto(user: User): z.infer<typeof UserSchema> {
  return {
    id: user.id,
    first_name: user.firstName,
    last_name: user.lastName,
    email: user.email,
    shipping_address: user.shippingAddress,
  };
}

export function toCartDto(cartItems: CartItem[]): z.infer<typeof CartSchema> {
  return {
    items: cartItems.map((cartItem) => ({
      item_id: cartItem.itemId,
      quantity: cartItem.quantity,
    })),
  };
}

const createUserRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['user'],
  summary: 'Register a customer',
  request: {
    body: {
      content: {
        'application/json': {
          schema: CreateUserSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    201: {
      content: {
        'application/json': {
          schema: successSchema(UserSchema),
        },
      },
      description: 'The created user, without the password',
    },
    409: errorResponse('A user with this email already exists'),
    422: errorResponse('Request validation failed'),
  },
});

const addToCartRoute = createRoute({
  method: 'post',
  path: '/{user_id}/cart',
  tags: ['user'],
  summary: "Add an item to a user's cart",
  request: {
    params: UserIdParamSchema,
    body: {
      content: {
        'application/json': {
          schema: AddToCartSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: successSchema(CartSchema),
        },
      },
      description: 'The whole cart after the addition',
    },
    409: errorResponse('Unknown user or item, not enough stock, or item already in cart'),
    422: errorResponse('Request validation failed'),
  },
});

const getCartRoute = createRoute({
  method: 'get',
  path: '/{user_id}/cart',
  tags: ['user'],
  summary: "List a user's cart",
  request: {
    params: UserIdParamSchema,
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: successSchema(CartSchema),
        },
      },
      description: 'Cart contents; empty for an unknown user',
    },
    422: errorResponse('Request validation failed'),
  },
});

export function createUserRoutes(users: UserService, cart: CartService) {
  const userRoutes = createRouter();

  // POST /users - Register a customer (409 on duplicate email)
  userRoutes.openapi(createUserRoute, async (c) => {
    const body = c.req.valid('json');

    const user = await users.createUser({
      firstName: body.first_name,
      lastName: body.last_name,
      email: body.email,
      password: body.password,
      shippingAddress: body.shipping_address,
    });

    return c.json(success(toUserDto(user), c.get('requestId')), 201);
  });

  // POST /users/:user_id/cart - Add an item to the cart
  userRoutes.openapi(addToCartRoute, async (c) => {
    const { user_id } = c.req.valid('param');
    const body = c.req.valid('json');

    const cartItems = await cart.addItemToCart(user_id, {
      itemId: body.item_id,
      quantity: body.quantity,
    });

    return c.json(success(toCartDto(cartItems), c.get('requestId')), 200);
  });

  // GET /users/:user_id/cart - List the cart
  userRoutes.openapi(getCartRoute, async (c) => {
    const { user_id } = c.req.valid('param');

    const cartItems = await cart.listCartItems(user_id);

    return c.json(success(toCartDto(cartItems), c.get('requestId')), 200);
  });

  return userRoutes;
}
