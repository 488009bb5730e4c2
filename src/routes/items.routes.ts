import { createRoute, z } from '@hono/zod-openapi';
import { createRouter, errorResponse, successSchema } from '../config/openapi.js';
import { MAX_QUANTITY, priceProblem, type Item } from '../domain/index.js';
import type { ItemService } from '../services/index.js';
import { success } from '../utils/response.js';

export const ItemSchema = z
  .object({
    id: z.string().uuid(),
    name: z.string(),
    description: z.string().nullable(),
    price: z.string().openapi({ example: '19.99' }),
    quantity: z.number().int(),
  })
  .openapi('Item');

export const CreateItemSchema = z
  .object({
    name: z.string().min(1, 'Name is required').max(255),
    description: z.string().nullable().optional(),
    price: z
      .union([z.number(), z.string()])
      .openapi({ example: '19.99' })
      .transform((value) => String(value).trim())
      .superRefine((value, ctx) => {
        const problem = priceProblem(value);
        if (problem) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
        }
      }),
    quantity: z
      .number()
      .int()
      .nonnegative('Quantity cannot be negative')
      .max(MAX_QUANTITY, 'Quantity is too large'),
  })
  .openapi('CreateItemRequest');

export type ItemDto = z.infer<typeof ItemSchema>;

export function toItemDto(item: Item): ItemDto {
  return {
    id: item.id,
    name: item.name,
    description: item.description,
    price: item.price,
    quantity: item.quantity,
  };
}

const createItemRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['item'],
  summary: 'Create an item',
  request: {
    body: {
      content: {
        'application/json': {
          schema: CreateItemSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    201: {
      content: {
        'application/json': {
          schema: successSchema(ItemSchema),
        },
      },
      description: 'The created item',
    },
    409: errorResponse('An item with this name already exists'),
    422: errorResponse('Request validation failed'),
  },
});

const listItemsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['item'],
  summary: 'List all items',
  responses: {
    200: {
      content: {
        'application/json': {
          schema: successSchema(z.object({ items: z.array(ItemSchema) })),
        },
      },
      description: 'Every item in the catalogue',
    },
  },
});

export function createItemRoutes(items: ItemService) {
  const itemRoutes = createRouter();

  // POST /items - Add an item to the catalogue (409 on duplicate name)
  itemRoutes.openapi(createItemRoute, async (c) => {
    const body = c.req.valid('json');

    const item = await items.createItem({
      name: body.name,
      description: body.description,
      price: body.price,
      quantity: body.quantity,
    });

    return c.json(success(toItemDto(item), c.get('requestId')), 201);
  });

  // GET /items - List the catalogue
  itemRoutes.openapi(listItemsRoute, async (c) => {
    const all = await items.listItems();

    return c.json(success({ items: all.map(toItemDto) }, c.get('requestId')), 200);
  });

  return itemRoutes;
}
