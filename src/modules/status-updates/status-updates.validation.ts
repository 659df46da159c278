import { z } from 'zod';
import { SHIPMENT_STATUSES } from '../../constants';

export const createStatusUpdateSchema = z.object({
  shipment_id: z.number().int().positive(),
  status: z.enum(SHIPMENT_STATUSES),
  note: z.string().max(2000).optional(),
  photo_url: z.string().url().max(500).nullable().optional(),
  latitude: z.number().min(-90).max(90).nullable().optional(),
  longitude: z.number().min(-180).max(180).nullable().optional(),
  location_accuracy_m: z.number().int().nonnegative().nullable().optional(),
});

export type CreateStatusUpdateInput = z.infer<typeof createStatusUpdateSchema>;
