export * from './types';
export * from './users.repository';
export * from './drivers.repository';
export * from './products.repository';
export * from './warehouses.repository';
export * from './customers.repository';
export * from './shipments.repository';
export * from './status-updates.repository';
