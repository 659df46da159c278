import { Warehouse } from '../../connections/db/models';
import { DataStore } from '../../connections/db/store';
import { AppContext } from '../../types/context.types';
import { Actor } from '../../types/request.types';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { assertManager } from '../../utils/permissions';
import { CreateWarehouseBody, UpdateWarehouseBody } from './warehouses.validation';

// The unique index catches concurrent duplicates; this gives the common case a clear message
const assertUniqueSite = async (store: DataStore, name: string, location: string, excludeId?: number) => {
  const existing = await store.warehouses.findByNameAndLocation(name, location, excludeId);
  if (existing) {
    throw new ConflictError('A warehouse with the same name and location already exists', {
      warehouse_id: existing.id,
    });
  }
};

export const createWarehousesService = ({ db }: AppContext) => ({
  async list(actor: Actor): Promise<Warehouse[]> {
    assertManager(actor, 'list warehouses');
    return db.store.warehouses.list();
  },

  async get(actor: Actor, id: number): Promise<Warehouse> {
    assertManager(actor, 'view warehouses');
    const warehouse = await db.store.warehouses.findById(id);
    if (!warehouse) {
      throw new NotFoundError('Warehouse', id);
    }
    return warehouse;
  },

  async create(actor: Actor, input: CreateWarehouseBody): Promise<Warehouse> {
    assertManager(actor, 'create warehouses');
    await assertUniqueSite(db.store, input.name, input.location);
    return db.store.warehouses.create(input);
  },

  async update(actor: Actor, id: number, input: UpdateWarehouseBody): Promise<Warehouse> {
    assertManager(actor, 'update warehouses');

    const warehouse = await db.transaction(async (store) => {
      const current = await store.warehouses.findById(id);
      if (!current) {
        throw new NotFoundError('Warehouse', id);
      }

      await assertUniqueSite(store, input.name ?? current.name, input.location ?? current.location, id);

      const updated = await store.warehouses.update(id, input);
      if (!updated) {
        throw new NotFoundError('Warehouse', id);
      }
      return updated;
    });

    auditLog('warehouse.updated', { warehouse_id: id, user_id: actor.userId });
    return warehouse;
  },

  async delete(actor: Actor, id: number): Promise<void> {
    assertManager(actor, 'delete warehouses');

    await db.transaction(async (store) => {
      if (!(await store.warehouses.findById(id))) {
        throw new NotFoundError('Warehouse', id);
      }

      const shipmentsCount = await store.shipments.countByWarehouse(id);
      if (shipmentsCount > 0) {
        throw new ConflictError('Warehouse is referenced by shipments and cannot be deleted', {
          warehouse_id: id,
          shipments_count: shipmentsCount,
        });
      }

      await store.warehouses.delete(id);
    });

    auditLog('warehouse.deleted', { warehouse_id: id, user_id: actor.userId });
  },
});

export type WarehousesService = ReturnType<typeof createWarehousesService>;
