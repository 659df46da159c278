import { StatusUpdate } from '../../connections/db/models';
import { appConfig } from '../../connections/config/app.config';
import { AppContext } from '../../types/context.types';
import { Actor } from '../../types/request.types';
import { cacheKeys } from '../../utils/cache';
import {
  GpsAccuracyTooLowError,
  IncompleteLocationError,
  NotFoundError,
  PermissionDeniedError,
} from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { assertDriver, assertManager } from '../../utils/permissions';
import { validateTransition } from './shipment-status.machine';
import { syncShipmentStatus } from './status-sync';
import { CreateStatusUpdateInput } from './status-updates.validation';

export interface StatusUpdateRules {
  gpsMaxAccuracyMeters: number;
}

export const createStatusUpdatesService = (
  { db, cache }: AppContext,
  rules: StatusUpdateRules = { gpsMaxAccuracyMeters: appConfig.gpsMaxAccuracyMeters }
) => {
  const invalidateDriver = async (driverId: number | null) => {
    const keys = driverId === null ? [] : [cacheKeys.driverShipments(driverId)];
    await cache.invalidate(...keys, cacheKeys.driverBoard());
  };

  return {
    /**
     * Record a driver's status update and move the shipment's status with it.
     * Checks run in a fixed order: role, shipment, assignment, GPS accuracy,
     * coordinate pairing, then the transition itself.
     */
    async create(actor: Actor, input: CreateStatusUpdateInput): Promise<StatusUpdate> {
      const driver = assertDriver(actor, 'post status updates');

      const statusUpdate = await db.transaction(async (store) => {
        const shipment = await store.shipments.findByIdForUpdate(input.shipment_id);
        if (!shipment) {
          throw new NotFoundError('Shipment', input.shipment_id);
        }

        if (shipment.driver_id !== driver.driverId) {
          throw new PermissionDeniedError('You are not the assigned driver for this shipment');
        }

        const accuracy = input.location_accuracy_m ?? null;
        if (accuracy !== null && accuracy > rules.gpsMaxAccuracyMeters) {
          throw new GpsAccuracyTooLowError(accuracy, rules.gpsMaxAccuracyMeters);
        }

        const latitude = input.latitude ?? null;
        const longitude = input.longitude ?? null;
        if ((latitude === null) !== (longitude === null)) {
          throw new IncompleteLocationError();
        }

        validateTransition(shipment.current_status, input.status);

        const created = await store.statusUpdates.create({
          shipment_id: shipment.id,
          status: input.status,
          note: input.note ?? '',
          photo_url: input.photo_url ?? null,
          latitude,
          longitude,
          location_accuracy_m: accuracy,
        });

        await syncShipmentStatus(store, shipment.id);
        return created;
      });

      auditLog('status_update.created', {
        status_update_id: statusUpdate.id,
        shipment_id: statusUpdate.shipment_id,
        status: statusUpdate.status,
        driver_id: driver.driverId,
      });
      await invalidateDriver(driver.driverId);
      return statusUpdate;
    },

    /**
     * Remove a status update; the shipment falls back to the next-latest status, or NEW
     */
    async delete(actor: Actor, id: number): Promise<void> {
      assertManager(actor, 'delete status updates');

      const driverId = await db.transaction(async (store) => {
        const statusUpdate = await store.statusUpdates.findById(id);
        if (!statusUpdate) {
          throw new NotFoundError('Status update', id);
        }

        const shipment = await store.shipments.findByIdForUpdate(statusUpdate.shipment_id);
        await store.statusUpdates.delete(id);
        await syncShipmentStatus(store, statusUpdate.shipment_id);
        return shipment?.driver_id ?? null;
      });

      auditLog('status_update.deleted', { status_update_id: id, user_id: actor.userId });
      await invalidateDriver(driverId);
    },
  };
};

export type StatusUpdatesService = ReturnType<typeof createStatusUpdatesService>;
