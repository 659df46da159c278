import { Pool } from 'pg';
import { withTransaction } from './connection';
import {
  CustomerRepository,
  DriverRepository,
  ProductRepository,
  Queryable,
  ShipmentRepository,
  StatusUpdateRepository,
  UserRepository,
  WarehouseRepository,
  createCustomerRepository,
  createDriverRepository,
  createProductRepository,
  createShipmentRepository,
  createStatusUpdateRepository,
  createUserRepository,
  createWarehouseRepository,
} from './repositories';

/**
 * Every repository, bound to the same connection
 */
export interface DataStore {
  users: UserRepository;
  drivers: DriverRepository;
  products: ProductRepository;
  warehouses: WarehouseRepository;
  customers: CustomerRepository;
  shipments: ShipmentRepository;
  statusUpdates: StatusUpdateRepository;
}

/**
 * Storage backend the services run against. `transaction` gives the work a
 * store whose writes commit together or not at all; `store` runs each call on
 * its own.
 */
export interface Database {
  store: DataStore;
  transaction<T>(work: (store: DataStore) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}

export const createDataStore = (db: Queryable): DataStore => ({
  users: createUserRepository(db),
  drivers: createDriverRepository(db),
  products: createProductRepository(db),
  warehouses: createWarehouseRepository(db),
  customers: createCustomerRepository(db),
  shipments: createShipmentRepository(db),
  statusUpdates: createStatusUpdateRepository(db),
});

export const createPgDatabase = (source: Pool): Database => ({
  store: createDataStore(source),

  transaction(work) {
    return withTransaction(source, (client) => work(createDataStore(client)));
  },

  async ping() {
    await source.query('SELECT 1');
  },
});
