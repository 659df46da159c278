import { z } from 'zod';
import { MAX_QUANTITY } from '../../constants';

// Validation schemas for the products module
export const createProductSchema = z.object({
  name: z.string().trim().min(1, 'Product name is required').max(200),
  price: z.number().positive('Price must be greater than 0'),
  unit: z.string().trim().min(1).max(50).optional(),
  stock_qty: z.number().int().nonnegative().max(MAX_QUANTITY).optional(),
  is_active: z.boolean().optional(),
});

// stock_qty is rejected here: stock only moves through the ledger
export const updateProductSchema = z
  .object({
    name: z.string().trim().min(1, 'Product name is required').max(200),
    price: z.number().positive('Price must be greater than 0'),
    unit: z.string().trim().min(1).max(50),
    is_active: z.boolean(),
  })
  .partial()
  .strict();

export const restockSchema = z.object({
  quantity: z.number(),
});

export type CreateProductBody = z.infer<typeof createProductSchema>;
export type UpdateProductBody = z.infer<typeof updateProductSchema>;
