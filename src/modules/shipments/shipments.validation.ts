import { z } from 'zod';

const id = z.number().int().positive();

// quantity is only type-checked here; the ledger gate rejects non-positive,
// fractional and out-of-range values with INVALID_QUANTITY
export const createShipmentSchema = z.object({
  product_id: id,
  warehouse_id: id,
  driver_id: id.nullable().optional(),
  customer_id: id.nullable().optional(),
  customer_address: z.string().max(255).nullable().optional(),
  notes: z.string().optional(),
  quantity: z.number().optional(),
});

// current_status is not part of either schema, so a client-sent value is dropped
export const updateShipmentSchema = createShipmentSchema.partial();

export const shipmentListQuerySchema = z.object({
  updated_since: z.coerce.date().optional(),
});

export type CreateShipmentInput = z.infer<typeof createShipmentSchema>;
export type UpdateShipmentInput = z.infer<typeof updateShipmentSchema>;
