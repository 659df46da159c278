import { z } from 'zod';
import { optionalAddressSchema } from '../../utils/validation';

const customerFieldsSchema = z.object({
  name: z.string().trim().min(1, 'Customer name is required').max(255),
  phone: z.string().trim().min(1, 'Phone is required').max(20),
  address: optionalAddressSchema,
  address2: optionalAddressSchema,
  address3: optionalAddressSchema,
});

export const createCustomerSchema = customerFieldsSchema.refine(
  (customer) => Boolean(customer.address || customer.address2 || customer.address3),
  {
    message: 'Provide at least one address',
    path: ['addresses'],
  }
);

// Whether an address remains is checked against the stored row in the service
export const updateCustomerSchema = customerFieldsSchema.partial();

export type CreateCustomerBody = z.infer<typeof createCustomerSchema>;
export type UpdateCustomerBody = z.infer<typeof updateCustomerSchema>;
