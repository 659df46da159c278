import { Customer, CustomerSuggestion, savedAddresses } from '../../connections/db/models';
import { SearchTerm } from '../../connections/db/repositories';
import { AUTOCOMPLETE_LIMIT } from '../../constants';
import { AppContext } from '../../types/context.types';
import { Actor } from '../../types/request.types';
import { CustomerAddresses } from '../../types/response.types';
import { ConflictError, InvalidAddressError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { assertManager } from '../../utils/permissions';
import { CreateCustomerBody, UpdateCustomerBody } from './customers.validation';

export const createCustomersService = ({ db }: AppContext) => {
  const loadCustomer = async (customerId: number): Promise<Customer> => {
    const customer = await db.store.customers.findById(customerId);
    if (!customer) {
      throw new NotFoundError('Customer', customerId);
    }
    return customer;
  };

  return {
    async list(actor: Actor): Promise<Customer[]> {
      assertManager(actor, 'list customers');
      return db.store.customers.list();
    },

    async get(actor: Actor, customerId: number): Promise<Customer> {
      assertManager(actor, 'view customers');
      return loadCustomer(customerId);
    },

    async create(actor: Actor, input: CreateCustomerBody): Promise<Customer> {
      assertManager(actor, 'create customers');
      return db.store.customers.create(input);
    },

    async update(actor: Actor, customerId: number, input: UpdateCustomerBody): Promise<Customer> {
      assertManager(actor, 'update customers');

      const customer = await db.transaction(async (store) => {
        const current = await store.customers.findById(customerId);
        if (!current) {
          throw new NotFoundError('Customer', customerId);
        }

        const merged = { ...current, ...input };
        if (savedAddresses(merged).length === 0) {
          throw new InvalidAddressError('Provide at least one address', []);
        }

        const updated = await store.customers.update(customerId, input);
        if (!updated) {
          throw new NotFoundError('Customer', customerId);
        }
        return updated;
      });

      auditLog('customer.updated', { customer_id: customerId, user_id: actor.userId });
      return customer;
    },

    async delete(actor: Actor, customerId: number): Promise<void> {
      assertManager(actor, 'delete customers');

      await db.transaction(async (store) => {
        if (!(await store.customers.findById(customerId))) {
          throw new NotFoundError('Customer', customerId);
        }

        const shipmentsCount = await store.shipments.countByCustomer(customerId);
        if (shipmentsCount > 0) {
          throw new ConflictError('Customer is referenced by shipments and cannot be deleted', {
            customer_id: customerId,
            shipments_count: shipmentsCount,
          });
        }

        await store.customers.delete(customerId);
      });

      auditLog('customer.deleted', { customer_id: customerId, user_id: actor.userId });
    },

    async autocomplete(actor: Actor, term: SearchTerm | null): Promise<CustomerSuggestion[]> {
      assertManager(actor, 'search customers');
      return db.store.customers.search(term, AUTOCOMPLETE_LIMIT);
    },

    async addresses(actor: Actor, customerId: number): Promise<CustomerAddresses> {
      assertManager(actor, 'view customer addresses');
      const customer = await loadCustomer(customerId);
      return { customer_id: customer.id, addresses: savedAddresses(customer) };
    },
  };
};

export type CustomersService = ReturnType<typeof createCustomersService>;
