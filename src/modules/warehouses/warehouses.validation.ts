import { z } from 'zod';

const warehouseFieldsSchema = z.object({
  name: z.string().trim().min(1, 'Warehouse name is required').max(255),
  location: z.string().trim().min(1, 'Location is required').max(255),
});

export const createWarehouseSchema = warehouseFieldsSchema;
export const updateWarehouseSchema = warehouseFieldsSchema.partial();

export type CreateWarehouseBody = z.infer<typeof createWarehouseSchema>;
export type UpdateWarehouseBody = z.infer<typeof updateWarehouseSchema>;
