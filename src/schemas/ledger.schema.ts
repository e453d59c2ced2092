import { z } from 'zod';
import { MAX_QUANTITY } from '../domains/ledger';

const skuSchema = z.string().trim().min(1).max(64);

export const registerProductSchema = z
  .object({
    sku: skuSchema,
    name: z.string().trim().min(1).max(255),
    minLevel: z.number().int().nonnegative().max(MAX_QUANTITY),
    maxLevel: z.number().int().nonnegative().max(MAX_QUANTITY),
    cost: z.number().nonnegative()
  })
  .refine((data) => data.maxLevel >= data.minLevel, {
    message: 'maxLevel must be greater than or equal to minLevel',
    path: ['maxLevel']
  });

export const postMovementSchema = z.object({
  sku: skuSchema,
  direction: z.enum(['E', 'S'], {
    errorMap: () => ({ message: "Invalid movement direction. Use 'E' for inbound or 'S' for outbound." })
  }),
  quantity: z.number().int().positive().max(MAX_QUANTITY)
});

export const skuParamSchema = skuSchema;

export const movementListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(200).optional(),
  offset: z.coerce.number().int().nonnegative().optional()
});

export type RegisterProductBody = z.infer<typeof registerProductSchema>;
export type PostMovementBody = z.infer<typeof postMovementSchema>;
