import { z } from 'zod';

// Strict boolean: "true", 1 and friends are rejected
export const driverStatusSchema = z.object({
  is_active: z.boolean({
    required_error: 'is_active is required',
    invalid_type_error: 'is_active must be a boolean',
  }),
});

export type DriverStatusInput = z.infer<typeof driverStatusSchema>;
