import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { Customer, Product, User, Warehouse } from '../../src/connections/db/models';
import { TestContext, bearer, createTestContext, seedCustomer, seedManager, seedProduct, seedWarehouse } from '../support/fixtures';

describe('directory API', () => {
  let ctx: TestContext;
  let manager: User;

  beforeEach(() => {
    ctx = createTestContext();
    manager = seedManager(ctx.db).user;
  });

  const addShipment = async (
    product: Product,
    warehouse: Warehouse,
    options: { customer?: Customer; notes?: string } = {}
  ) =>
    ctx.db.store.shipments.create({
      product_id: product.id,
      warehouse_id: warehouse.id,
      driver_id: null,
      customer_id: options.customer?.id ?? null,
      customer_address: options.customer ? options.customer.address : null,
      notes: options.notes ?? '',
      quantity: 1,
    });

  describe('customers', () => {
    it('returns a customer by id', async () => {
      const customer = await seedCustomer(ctx.db, ['1 Main St']);

      const res = await request(ctx.app).get(`/api/customers/${customer.id}`).set('Authorization', bearer(manager));

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: customer.id, name: 'Acme Foods', address: '1 Main St' });
    });

    it('updates only the fields sent', async () => {
      const customer = await seedCustomer(ctx.db, ['1 Main St']);

      const res = await request(ctx.app)
        .patch(`/api/customers/${customer.id}`)
        .set('Authorization', bearer(manager))
        .send({ phone: ' 555-0199 ', address2: '9 Side Rd' });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        name: 'Acme Foods',
        phone: '555-0199',
        address: '1 Main St',
        address2: '9 Side Rd',
        address3: '',
      });
    });

    it('refuses an update that clears the last address', async () => {
      const customer = await seedCustomer(ctx.db, ['1 Main St']);

      const res = await request(ctx.app)
        .patch(`/api/customers/${customer.id}`)
        .set('Authorization', bearer(manager))
        .send({ address: null });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Provide at least one address');
      expect(res.body.error).toEqual({ code: 'INVALID_ADDRESS', details: { allowed_addresses: [] } });
      await expect(ctx.db.store.customers.findById(customer.id)).resolves.toMatchObject({ address: '1 Main St' });
    });

    it('returns 404 when updating an unknown customer', async () => {
      const res = await request(ctx.app)
        .patch('/api/customers/999')
        .set('Authorization', bearer(manager))
        .send({ name: 'Bistro' });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Customer 999 not found');
    });

    it('deletes a customer no shipment uses', async () => {
      const customer = await seedCustomer(ctx.db, ['1 Main St']);

      const res = await request(ctx.app).delete(`/api/customers/${customer.id}`).set('Authorization', bearer(manager));

      expect(res.status).toBe(204);
      await expect(ctx.db.store.customers.findById(customer.id)).resolves.toBeNull();
    });

    it('keeps a customer that shipments still reference', async () => {
      const customer = await seedCustomer(ctx.db, ['1 Main St']);
      const product = await seedProduct(ctx.db, 5);
      const warehouse = await seedWarehouse(ctx.db);
      await addShipment(product, warehouse, { customer });
      await addShipment(product, warehouse, { customer });

      const res = await request(ctx.app).delete(`/api/customers/${customer.id}`).set('Authorization', bearer(manager));

      expect(res.status).toBe(409);
      expect(res.body.message).toBe('Customer is referenced by shipments and cannot be deleted');
      expect(res.body.error).toEqual({
        code: 'CONFLICT',
        details: { customer_id: customer.id, shipments_count: 2 },
      });
    });

    it('returns 404 when deleting an unknown customer', async () => {
      const res = await request(ctx.app).delete('/api/customers/999').set('Authorization', bearer(manager));

      expect(res.status).toBe(404);
    });
  });

  describe('warehouses', () => {
    it('returns a warehouse by id', async () => {
      const warehouse = await seedWarehouse(ctx.db, 'North');

      const res = await request(ctx.app).get(`/api/warehouses/${warehouse.id}`).set('Authorization', bearer(manager));

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: warehouse.id, name: 'North', location: 'Dock 1' });
    });

    it('returns 404 for an unknown warehouse', async () => {
      const res = await request(ctx.app).get('/api/warehouses/999').set('Authorization', bearer(manager));

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Warehouse 999 not found');
    });

    it('renames a warehouse', async () => {
      const warehouse = await seedWarehouse(ctx.db, 'North');

      const res = await request(ctx.app)
        .patch(`/api/warehouses/${warehouse.id}`)
        .set('Authorization', bearer(manager))
        .send({ name: ' Northgate ' });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: warehouse.id, name: 'Northgate', location: 'Dock 1' });
    });

    it('saves a warehouse under its own name and location', async () => {
      const warehouse = await seedWarehouse(ctx.db, 'North');

      const res = await request(ctx.app)
        .patch(`/api/warehouses/${warehouse.id}`)
        .set('Authorization', bearer(manager))
        .send({ name: 'NORTH', location: 'Dock 1' });

      expect(res.status).toBe(200);
      expect(res.body.data.name).toBe('NORTH');
    });

    it('refuses an update that collides with another warehouse', async () => {
      const existing = await seedWarehouse(ctx.db, 'North');
      const warehouse = await seedWarehouse(ctx.db, 'South');

      const res = await request(ctx.app)
        .patch(`/api/warehouses/${warehouse.id}`)
        .set('Authorization', bearer(manager))
        .send({ name: 'north' });

      expect(res.status).toBe(409);
      expect(res.body.message).toBe('A warehouse with the same name and location already exists');
      expect(res.body.error.details).toEqual({ warehouse_id: existing.id });
    });

    it('deletes a warehouse no shipment uses', async () => {
      const warehouse = await seedWarehouse(ctx.db);

      const res = await request(ctx.app).delete(`/api/warehouses/${warehouse.id}`).set('Authorization', bearer(manager));

      expect(res.status).toBe(204);
      await expect(ctx.db.store.warehouses.findById(warehouse.id)).resolves.toBeNull();
    });

    it('keeps a warehouse that shipments still reference', async () => {
      const warehouse = await seedWarehouse(ctx.db);
      await addShipment(await seedProduct(ctx.db, 5), warehouse);

      const res = await request(ctx.app).delete(`/api/warehouses/${warehouse.id}`).set('Authorization', bearer(manager));

      expect(res.status).toBe(409);
      expect(res.body.message).toBe('Warehouse is referenced by shipments and cannot be deleted');
      expect(res.body.error.details).toEqual({ warehouse_id: warehouse.id, shipments_count: 1 });
    });
  });

  describe('shipment autocomplete', () => {
    let tomatoes: Product;
    let onions: Product;
    let warehouse: Warehouse;

    beforeEach(async () => {
      tomatoes = await seedProduct(ctx.db, 50, 'Tomatoes');
      onions = await seedProduct(ctx.db, 50, 'Onions');
      warehouse = await seedWarehouse(ctx.db);
    });

    const autocomplete = (q: string) =>
      request(ctx.app).get('/api/shipments/autocomplete').query({ q }).set('Authorization', bearer(manager));

    it('matches a number against the shipment id only', async () => {
      const first = await addShipment(tomatoes, warehouse);
      await addShipment(onions, warehouse, { notes: `call ${first.id}` });

      const res = await autocomplete(String(first.id));

      expect(res.status).toBe(200);
      expect(res.body.data.map((row: { id: number }) => row.id)).toEqual([first.id]);
      expect(res.body.meta).toEqual({ count: 1 });
    });

    it('matches text against product name or notes, newest first', async () => {
      const byName = await addShipment(tomatoes, warehouse);
      await addShipment(onions, warehouse, { notes: 'leave at gate' });
      const byNotes = await addShipment(onions, warehouse, { notes: 'Swap for TOMATO paste' });

      const res = await autocomplete('tomato');

      expect(res.status).toBe(200);
      expect(res.body.data.map((row: { id: number }) => row.id)).toEqual([byNotes.id, byName.id]);
      expect(res.body.data[1]).toMatchObject({ product_name: 'Tomatoes' });
    });

    it('returns no more than 20 matches', async () => {
      for (let i = 0; i < 25; i += 1) {
        await addShipment(tomatoes, warehouse);
      }

      const res = await autocomplete('toma');

      expect(res.body.data).toHaveLength(20);
    });

    it('returns nothing for a number beyond any shipment id', async () => {
      await addShipment(tomatoes, warehouse);

      const res = await autocomplete('99999999999');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([]);
    });
  });

  describe('customer autocomplete', () => {
    let acme: Customer;
    let bistro: Customer;

    beforeEach(async () => {
      acme = await ctx.db.store.customers.create({
        name: 'Acme Foods',
        phone: '900-4444',
        address: '1 Main St',
        address2: '',
        address3: '',
      });
      bistro = await ctx.db.store.customers.create({
        name: 'Harbour Bistro',
        phone: '900-8888',
        address: '4 Harbour Rd',
        address2: '5 Quay St',
        address3: '',
      });
    });

    const autocomplete = (q: string) =>
      request(ctx.app).get('/api/customers/autocomplete').query({ q }).set('Authorization', bearer(manager));

    it('matches a number against the customer id', async () => {
      const res = await autocomplete(String(acme.id));

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([{ id: acme.id, name: 'Acme Foods', phone: '900-4444', address: '1 Main St' }]);
    });

    it('matches a number against the phone', async () => {
      const res = await autocomplete('8888');

      expect(res.body.data.map((row: { id: number }) => row.id)).toEqual([bistro.id]);
    });

    it('matches text against name or phone, newest first', async () => {
      const byName = await autocomplete('harbour');
      const byPhone = await autocomplete('900-');

      expect(byName.body.data.map((row: { id: number }) => row.id)).toEqual([bistro.id]);
      expect(byPhone.body.data.map((row: { id: number }) => row.id)).toEqual([bistro.id, acme.id]);
    });

    it('lists recent customers for a blank query', async () => {
      const res = await request(ctx.app).get('/api/customers/autocomplete').set('Authorization', bearer(manager));

      expect(res.status).toBe(200);
      expect(res.body.meta).toEqual({ count: 2 });
    });
  });
});
