import { beforeEach, describe, expect, it } from 'vitest';
import { createShipmentsService } from '../../src/modules/shipments/shipments.service';
import { MemoryProjectionCache, cacheKeys } from '../../src/utils/cache';
import {
  DriverUnavailableError,
  InsufficientStockError,
  InvalidAddressError,
  InvalidQuantityError,
  NotFoundError,
  PermissionDeniedError,
} from '../../src/utils/errors';
import { MemoryDatabase } from '../support/memoryDatabase';
import { seedCustomer, seedDriver, seedManager, seedProduct, seedWarehouse } from '../support/fixtures';

describe('shipments service', () => {
  let db: MemoryDatabase;
  let cache: MemoryProjectionCache;
  let service: ReturnType<typeof createShipmentsService>;
  let manager: ReturnType<typeof seedManager>;
  let warehouseId: number;

  const stockOf = (productId: number) => db.product(productId)?.stock_qty;

  beforeEach(async () => {
    db = new MemoryDatabase();
    cache = new MemoryProjectionCache();
    service = createShipmentsService({ db, cache });
    manager = seedManager(db);
    warehouseId = (await seedWarehouse(db)).id;
  });

  describe('create', () => {
    it('reserves stock down to zero, then refuses the next shipment and keeps no row for it', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db);

      const first = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 10,
      });
      expect(first.quantity).toBe(10);
      expect(stockOf(product.id)).toBe(0);

      const error = await service
        .create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, driver_id: driver.id, quantity: 1 })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InsufficientStockError);
      expect(error).toMatchObject({ available: 0 });
      expect(db.tables.shipments).toHaveLength(1);
      expect(stockOf(product.id)).toBe(0);
    });

    it('holds no stock without a driver and defaults quantity to 1', async () => {
      const product = await seedProduct(db, 10);

      const shipment = await service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId });

      expect(shipment).toMatchObject({
        driver_id: null,
        quantity: 1,
        current_status: 'NEW',
        product_name: 'Tomatoes',
        driver_username: null,
        notes: '',
      });
      expect(stockOf(product.id)).toBe(10);
    });

    it('rejects an inactive driver without touching stock', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db, 'resting', false);

      await expect(
        service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, driver_id: driver.id })
      ).rejects.toBeInstanceOf(DriverUnavailableError);

      expect(db.tables.shipments).toHaveLength(0);
      expect(stockOf(product.id)).toBe(10);
    });

    it.each([0, -1, 2.5, 3_000_000_000])('rejects quantity %s', async (quantity) => {
      const product = await seedProduct(db, 10);

      await expect(
        service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, quantity })
      ).rejects.toBeInstanceOf(InvalidQuantityError);
    });

    it('reports missing references as not found', async () => {
      const product = await seedProduct(db, 10);

      await expect(
        service.create(manager.actor, { product_id: 999, warehouse_id: warehouseId })
      ).rejects.toThrow('Product 999 not found');
      await expect(
        service.create(manager.actor, { product_id: product.id, warehouse_id: 999 })
      ).rejects.toThrow('Warehouse 999 not found');
      await expect(
        service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, driver_id: 999 })
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, customer_id: 999 })
      ).rejects.toThrow('Customer 999 not found');
    });

    it('only lets managers create shipments', async () => {
      const product = await seedProduct(db, 10);
      const { actor } = seedDriver(db);

      await expect(
        service.create(actor, { product_id: product.id, warehouse_id: warehouseId })
      ).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('drops the cached shipment list of the assigned driver', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db);
      await cache.set(cacheKeys.driverShipments(driver.id), []);
      await cache.set(cacheKeys.driverBoard(), []);

      await service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, driver_id: driver.id });

      await expect(cache.get(cacheKeys.driverShipments(driver.id))).resolves.toBeNull();
      await expect(cache.get(cacheKeys.driverBoard())).resolves.toBeNull();
    });
  });

  describe('customer address', () => {
    it('auto-selects the only saved address', async () => {
      const product = await seedProduct(db, 10);
      const customer = await seedCustomer(db, ['12 Harbour Road']);

      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        customer_id: customer.id,
      });

      expect(shipment.customer_address).toBe('12 Harbour Road');
      expect(shipment.customer_name).toBe('Acme Foods');
    });

    it('accepts a saved address after trimming it', async () => {
      const product = await seedProduct(db, 10);
      const customer = await seedCustomer(db, ['12 Harbour Road', '7 Mill Lane']);

      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        customer_id: customer.id,
        customer_address: '  7 Mill Lane ',
      });

      expect(shipment.customer_address).toBe('7 Mill Lane');
    });

    it('lists the allowed addresses when the address does not match', async () => {
      const product = await seedProduct(db, 10);
      const customer = await seedCustomer(db, ['12 Harbour Road', '7 Mill Lane']);

      const error = await service
        .create(manager.actor, {
          product_id: product.id,
          warehouse_id: warehouseId,
          customer_id: customer.id,
          customer_address: '99 Unknown Street',
        })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvalidAddressError);
      expect(error).toMatchObject({ details: { allowed_addresses: ['12 Harbour Road', '7 Mill Lane'] } });
    });

    it('requires a choice when the customer has several addresses', async () => {
      const product = await seedProduct(db, 10);
      const customer = await seedCustomer(db, ['12 Harbour Road', '7 Mill Lane']);

      await expect(
        service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId, customer_id: customer.id })
      ).rejects.toBeInstanceOf(InvalidAddressError);
    });

    it('rejects a customer with no saved addresses', async () => {
      const product = await seedProduct(db, 10);
      const customer = await seedCustomer(db, []);

      await expect(
        service.create(manager.actor, {
          product_id: product.id,
          warehouse_id: warehouseId,
          customer_id: customer.id,
          customer_address: 'anywhere',
        })
      ).rejects.toThrow('The customer has no saved addresses to use');
    });

    it('clears the address when there is no customer', async () => {
      const product = await seedProduct(db, 10);

      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        customer_address: '12 Harbour Road',
      });

      expect(shipment.customer_address).toBeNull();
    });
  });

  describe('update', () => {
    it('reserves and releases only the quantity difference', async () => {
      const product = await seedProduct(db, 50);
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 5,
      });
      expect(stockOf(product.id)).toBe(45);

      await service.update(manager.actor, shipment.id, { quantity: 8 });
      expect(stockOf(product.id)).toBe(42);

      await service.update(manager.actor, shipment.id, { quantity: 3 });
      expect(stockOf(product.id)).toBe(47);
    });

    it('reserves on driver assignment and releases on unassignment', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        quantity: 4,
      });

      await service.update(manager.actor, shipment.id, { driver_id: driver.id });
      expect(stockOf(product.id)).toBe(6);

      await service.update(manager.actor, shipment.id, { driver_id: null });
      expect(stockOf(product.id)).toBe(10);
    });

    it('moves the hold to the new product', async () => {
      const apples = await seedProduct(db, 10, 'Apples');
      const pears = await seedProduct(db, 10, 'Pears');
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: apples.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 2,
      });

      const updated = await service.update(manager.actor, shipment.id, { product_id: pears.id });

      expect(updated.product_name).toBe('Pears');
      expect(stockOf(apples.id)).toBe(10);
      expect(stockOf(pears.id)).toBe(8);
    });

    it('locks both products in id order before swapping the hold back', async () => {
      const apples = await seedProduct(db, 10, 'Apples');
      const pears = await seedProduct(db, 10, 'Pears');
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: pears.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 3,
      });
      expect(db.productLocks).toEqual([]);

      await service.update(manager.actor, shipment.id, { product_id: apples.id });
      await service.update(manager.actor, shipment.id, { product_id: pears.id });

      expect(db.productLocks).toEqual([
        [apples.id, pears.id],
        [apples.id, pears.id],
      ]);
      expect(stockOf(apples.id)).toBe(10);
      expect(stockOf(pears.id)).toBe(7);
    });

    it('makes no ledger call for an unchanged hold', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 3,
      });
      const updatedAt = db.product(product.id)?.updated_at;

      await service.update(manager.actor, shipment.id, { notes: 'Leave at the gate' });

      expect(stockOf(product.id)).toBe(7);
      expect(db.product(product.id)?.updated_at).toBe(updatedAt);
    });

    it('rolls the whole update back when stock runs out', async () => {
      const product = await seedProduct(db, 5);
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 2,
      });

      await expect(
        service.update(manager.actor, shipment.id, { quantity: 9, notes: 'rush' })
      ).rejects.toBeInstanceOf(InsufficientStockError);

      expect(db.shipment(shipment.id)).toMatchObject({ quantity: 2, notes: '' });
      expect(stockOf(product.id)).toBe(3);
    });

    it('keeps an already-assigned driver who has since gone inactive', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
      });
      await db.store.drivers.setActive(driver.id, false);

      const updated = await service.update(manager.actor, shipment.id, { notes: 'Fragile' });

      expect(updated).toMatchObject({ driver_id: driver.id, notes: 'Fragile' });
    });

    it('rejects reassignment to an inactive driver', async () => {
      const product = await seedProduct(db, 10);
      const busy = seedDriver(db, 'busy');
      const resting = seedDriver(db, 'resting', false);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: busy.driver.id,
      });

      await expect(
        service.update(manager.actor, shipment.id, { driver_id: resting.driver.id })
      ).rejects.toBeInstanceOf(DriverUnavailableError);
      expect(db.shipment(shipment.id)?.driver_id).toBe(busy.driver.id);
    });

    it('stamps a new assigned_at when the driver changes', async () => {
      const product = await seedProduct(db, 10);
      const first = seedDriver(db, 'first');
      const second = seedDriver(db, 'second');
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: first.driver.id,
      });
      const originalAssignedAt = db.shipment(shipment.id)?.assigned_at.getTime() ?? 0;

      await service.update(manager.actor, shipment.id, { notes: 'same driver' });
      expect(db.shipment(shipment.id)?.assigned_at.getTime()).toBe(originalAssignedAt);

      await service.update(manager.actor, shipment.id, { driver_id: second.driver.id });
      const reassigned = db.shipment(shipment.id);
      expect(reassigned?.assigned_at.getTime()).toBeGreaterThan(originalAssignedAt);
      expect(reassigned?.assigned_at).toEqual(reassigned?.updated_at);
      expect(reassigned?.driver_id).toBe(second.driver.id);
    });

    it('re-validates the stored address against a newly chosen customer', async () => {
      const product = await seedProduct(db, 10);
      const first = await seedCustomer(db, ['12 Harbour Road'], 'First');
      const second = await seedCustomer(db, ['7 Mill Lane', '3 Quay Street'], 'Second');
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        customer_id: first.id,
      });

      await expect(
        service.update(manager.actor, shipment.id, { customer_id: second.id })
      ).rejects.toBeInstanceOf(InvalidAddressError);

      const updated = await service.update(manager.actor, shipment.id, {
        customer_id: second.id,
        customer_address: '3 Quay Street',
      });
      expect(updated.customer_address).toBe('3 Quay Street');
    });

    it('reports a missing shipment', async () => {
      await expect(service.update(manager.actor, 999, { notes: 'x' })).rejects.toThrow('Shipment 999 not found');
    });
  });

  describe('delete', () => {
    it('returns held stock and removes the status history', async () => {
      const product = await seedProduct(db, 10);
      const { driver } = seedDriver(db);
      const shipment = await service.create(manager.actor, {
        product_id: product.id,
        warehouse_id: warehouseId,
        driver_id: driver.id,
        quantity: 4,
      });
      await db.store.statusUpdates.create({
        shipment_id: shipment.id,
        status: 'ASSIGNED',
        note: '',
        photo_url: null,
        latitude: null,
        longitude: null,
        location_accuracy_m: null,
      });

      await service.delete(manager.actor, shipment.id);

      expect(stockOf(product.id)).toBe(10);
      expect(db.tables.shipments).toHaveLength(0);
      expect(db.tables.statusUpdates).toHaveLength(0);
    });

    it('leaves stock alone for a shipment without a driver', async () => {
      const product = await seedProduct(db, 10);
      const shipment = await service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId });

      await service.delete(manager.actor, shipment.id);

      expect(stockOf(product.id)).toBe(10);
    });
  });

  describe('list', () => {
    it('filters by updated_since and orders newest first', async () => {
      const product = await seedProduct(db, 10);
      const older = await service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId });
      const newer = await service.create(manager.actor, { product_id: product.id, warehouse_id: warehouseId });
      const olderRow = db.shipment(older.id);
      const newerRow = db.shipment(newer.id);
      if (olderRow) olderRow.updated_at = new Date('2026-01-01T00:00:00Z');
      if (newerRow) newerRow.updated_at = new Date('2026-02-01T00:00:00Z');

      const all = await service.list(manager.actor);
      expect(all.map(row => row.id)).toEqual([newer.id, older.id]);

      const recent = await service.list(manager.actor, { updatedSince: new Date('2026-01-15T00:00:00Z') });
      expect(recent.map(row => row.id)).toEqual([newer.id]);
    });
  });
});
