import jwt from 'jsonwebtoken';
import { createApp } from '../../src/app';
import { appConfig } from '../../src/connections/config/app.config';
import { Customer, Driver, Product, User, Warehouse } from '../../src/connections/db/models';
import { Actor } from '../../src/types/request.types';
import { MemoryProjectionCache } from '../../src/utils/cache';
import { MemoryDatabase } from './memoryDatabase';

export const createTestContext = () => {
  const db = new MemoryDatabase();
  const cache = new MemoryProjectionCache();
  return { db, cache, app: createApp({ db, cache }) };
};

export type TestContext = ReturnType<typeof createTestContext>;

export const tokenFor = (user: Pick<User, 'id'>): string => jwt.sign({ userId: user.id }, appConfig.jwtSecret);

export const bearer = (user: Pick<User, 'id'>): string => `Bearer ${tokenFor(user)}`;

export const seedManager = (db: MemoryDatabase, username = 'manager') => {
  const user = db.addUser(username, 'manager');
  const actor: Actor = { userId: user.id, username: user.username, role: 'manager' };
  return { user, actor };
};

export const seedDriver = (db: MemoryDatabase, username = 'driver', isActive = true) => {
  const user = db.addUser(username, 'driver');
  const driver: Driver = db.addDriver(user.id, isActive);
  const actor: Actor = { userId: user.id, username: user.username, role: 'driver', driverId: driver.id };
  return { user, driver, actor };
};

export const seedProduct = async (db: MemoryDatabase, stockQty: number, name = 'Tomatoes'): Promise<Product> =>
  db.store.products.create({ name, price: 12.5, stock_qty: stockQty });

export const seedWarehouse = async (db: MemoryDatabase, name = 'Central'): Promise<Warehouse> =>
  db.store.warehouses.create({ name, location: 'Dock 1' });

export const seedCustomer = async (db: MemoryDatabase, addresses: string[], name = 'Acme Foods'): Promise<Customer> =>
  db.store.customers.create({
    name,
    phone: '555-0100',
    address: addresses[0] ?? '',
    address2: addresses[1] ?? '',
    address3: addresses[2] ?? '',
  });
