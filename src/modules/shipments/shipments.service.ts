import { DataStore } from '../../connections/db/store';
import { Customer, Shipment, ShipmentSummary, StatusUpdate, savedAddresses } from '../../connections/db/models';
import { SearchTerm } from '../../connections/db/repositories';
import { appConfig } from '../../connections/config/app.config';
import { AUTOCOMPLETE_LIMIT, DEFAULT_SHIPMENT_QUANTITY } from '../../constants';
import { AppContext } from '../../types/context.types';
import { Actor } from '../../types/request.types';
import { cacheKeys } from '../../utils/cache';
import {
  DriverUnavailableError,
  InvalidAddressError,
  InvalidQuantityError,
  NotFoundError,
} from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { assertManager } from '../../utils/permissions';
import { createInventoryLedger, isValidQuantity } from '../inventory/inventory.ledger';
import { StockHold, applyReservation, planReservation } from './reservation';
import { CreateShipmentInput, UpdateShipmentInput } from './shipments.validation';

/**
 * Shipment values after merging a patch onto the stored row
 */
interface ShipmentDraft {
  product_id: number;
  warehouse_id: number;
  driver_id: number | null;
  customer_id: number | null;
  customer_address: string | null;
  notes: string;
  quantity: number;
}

const holdOf = (shipment: Pick<Shipment, 'driver_id' | 'product_id' | 'quantity'>): StockHold => ({
  driverId: shipment.driver_id,
  productId: shipment.product_id,
  quantity: shipment.quantity,
});

/**
 * Pick the delivery address for a shipment to `customer`: the trimmed
 * address must be one of the customer's saved addresses, and a customer
 * with a single saved address gets it when none is supplied.
 */
export const resolveCustomerAddress = (customer: Customer, supplied: string | null | undefined): string => {
  const allowed = savedAddresses(customer);
  if (allowed.length === 0) {
    throw new InvalidAddressError('The customer has no saved addresses to use', []);
  }

  const address = (supplied ?? '').trim();
  if (!address) {
    if (allowed.length === 1) return allowed[0];
    throw new InvalidAddressError('A customer is selected; choose one of their saved addresses', allowed);
  }

  if (!allowed.includes(address)) {
    throw new InvalidAddressError("The address must be one of the customer's saved addresses", allowed);
  }

  return address;
};

/**
 * Check every reference and business rule of a draft before any stock moves.
 * `currentDriverId` is the driver already on the row; keeping it is not re-validated.
 */
const validateDraft = async (
  store: DataStore,
  draft: ShipmentDraft,
  currentDriverId: number | null
): Promise<ShipmentDraft> => {
  if (!(await store.products.findById(draft.product_id))) {
    throw new NotFoundError('Product', draft.product_id);
  }
  if (!(await store.warehouses.findById(draft.warehouse_id))) {
    throw new NotFoundError('Warehouse', draft.warehouse_id);
  }

  if (!isValidQuantity(draft.quantity)) {
    throw new InvalidQuantityError(draft.quantity);
  }

  if (draft.driver_id !== null) {
    const driver = await store.drivers.findById(draft.driver_id);
    if (!driver) {
      throw new NotFoundError('Driver', draft.driver_id);
    }
    if (draft.driver_id !== currentDriverId && !driver.is_active) {
      throw new DriverUnavailableError(draft.driver_id);
    }
  }

  let customerAddress: string | null = null;
  if (draft.customer_id !== null) {
    const customer = await store.customers.findById(draft.customer_id);
    if (!customer) {
      throw new NotFoundError('Customer', draft.customer_id);
    }
    customerAddress = resolveCustomerAddress(customer, draft.customer_address);
  }

  return { ...draft, customer_address: customerAddress };
};

const loadSummary = async (store: DataStore, id: number): Promise<ShipmentSummary> => {
  const summary = await store.shipments.findSummary(id);
  if (!summary) {
    throw new NotFoundError('Shipment', id);
  }
  return summary;
};

export interface ShipmentListFilter {
  updatedSince?: Date;
}

export const createShipmentsService = ({ db, cache }: AppContext) => {
  // Projections that read shipments of these drivers are stale after a write
  const invalidateDrivers = async (...driverIds: (number | null)[]) => {
    const keys = [...new Set(driverIds)]
      .filter((driverId): driverId is number => driverId !== null)
      .map(cacheKeys.driverShipments);
    await cache.invalidate(...keys, cacheKeys.driverBoard());
  };

  return {
    async list(actor: Actor, filter: ShipmentListFilter = {}): Promise<ShipmentSummary[]> {
      assertManager(actor, 'list shipments');
      return db.store.shipments.list({
        updatedSince: filter.updatedSince,
        limit: appConfig.shipmentListLimit,
      });
    },

    async autocomplete(actor: Actor, term: SearchTerm | null): Promise<ShipmentSummary[]> {
      assertManager(actor, 'search shipments');
      return db.store.shipments.search(term, AUTOCOMPLETE_LIMIT);
    },

    async get(actor: Actor, id: number): Promise<ShipmentSummary> {
      assertManager(actor, 'view shipments');
      return loadSummary(db.store, id);
    },

    async create(actor: Actor, input: CreateShipmentInput): Promise<ShipmentSummary> {
      assertManager(actor, 'create shipments');

      const summary = await db.transaction(async (store) => {
        const draft = await validateDraft(
          store,
          {
            product_id: input.product_id,
            warehouse_id: input.warehouse_id,
            driver_id: input.driver_id ?? null,
            customer_id: input.customer_id ?? null,
            customer_address: input.customer_address ?? null,
            notes: input.notes ?? '',
            quantity: input.quantity ?? DEFAULT_SHIPMENT_QUANTITY,
          },
          null
        );

        const shipment = await store.shipments.create(draft);
        await applyReservation(createInventoryLedger(store.products), planReservation(null, holdOf(shipment)));

        return loadSummary(store, shipment.id);
      });

      auditLog('shipment.created', {
        shipment_id: summary.id,
        product_id: summary.product_id,
        driver_id: summary.driver_id,
        quantity: summary.quantity,
        user_id: actor.userId,
      });
      await invalidateDrivers(summary.driver_id);
      return summary;
    },

    async update(actor: Actor, id: number, patch: UpdateShipmentInput): Promise<ShipmentSummary> {
      assertManager(actor, 'update shipments');

      const { previous, summary } = await db.transaction(async (store) => {
        const current = await store.shipments.findByIdForUpdate(id);
        if (!current) {
          throw new NotFoundError('Shipment', id);
        }

        const draft = await validateDraft(
          store,
          {
            product_id: patch.product_id ?? current.product_id,
            warehouse_id: patch.warehouse_id ?? current.warehouse_id,
            driver_id: patch.driver_id !== undefined ? patch.driver_id : current.driver_id,
            customer_id: patch.customer_id !== undefined ? patch.customer_id : current.customer_id,
            customer_address:
              patch.customer_address !== undefined ? patch.customer_address : current.customer_address,
            notes: patch.notes ?? current.notes,
            quantity: patch.quantity ?? current.quantity,
          },
          current.driver_id
        );

        const updated = await store.shipments.update(id, {
          ...draft,
          reassigned: draft.driver_id !== null && draft.driver_id !== current.driver_id,
        });

        const steps = planReservation(holdOf(current), holdOf(updated));
        await applyReservation(createInventoryLedger(store.products), steps);
        if (steps.length > 0) {
          logger.debug('Shipment stock hold adjusted', { shipment_id: id, steps });
        }

        return { previous: current, summary: await loadSummary(store, id) };
      });

      auditLog('shipment.updated', { shipment_id: id, user_id: actor.userId });
      await invalidateDrivers(previous.driver_id, summary.driver_id);
      return summary;
    },

    async delete(actor: Actor, id: number): Promise<void> {
      assertManager(actor, 'delete shipments');

      const removed = await db.transaction(async (store) => {
        const current = await store.shipments.findByIdForUpdate(id);
        if (!current) {
          throw new NotFoundError('Shipment', id);
        }

        await applyReservation(createInventoryLedger(store.products), planReservation(holdOf(current), null));
        await store.shipments.delete(id);
        return current;
      });

      auditLog('shipment.deleted', { shipment_id: id, user_id: actor.userId });
      await invalidateDrivers(removed.driver_id);
    },

    async listStatusUpdates(actor: Actor, id: number): Promise<StatusUpdate[]> {
      assertManager(actor, 'view shipment history');
      if (!(await db.store.shipments.findById(id))) {
        throw new NotFoundError('Shipment', id);
      }
      return db.store.statusUpdates.listForShipment(id);
    },
  };
};

export type ShipmentsService = ReturnType<typeof createShipmentsService>;
