export interface Customer {
  id: number;
  name: string;
  phone: string;
  address: string;
  address2: string;
  address3: string;
  created_at: Date;
  updated_at: Date;
}

export interface CreateCustomerInput {
  name: string;
  phone: string;
  address: string;
  address2: string;
  address3: string;
}

export type UpdateCustomerInput = Partial<CreateCustomerInput>;

// Autocomplete row: enough to pick a customer
export type CustomerSuggestion = Pick<Customer, 'id' | 'name' | 'phone' | 'address'>;

/**
 * Saved addresses a shipment may be delivered to, in slot order
 */
export const savedAddresses = (customer: Pick<Customer, 'address' | 'address2' | 'address3'>): string[] =>
  [customer.address, customer.address2, customer.address3]
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
