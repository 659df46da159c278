import { DriverActivity, ShipmentSummary } from '../../connections/db/models';
import { DRIVER_AVAILABILITY, DriverAvailability, SHIPMENT_STATUS } from '../../constants';
import { AppContext } from '../../types/context.types';
import { Actor } from '../../types/request.types';
import { DriverBoardEntry, DriverStatusView } from '../../types/response.types';
import { Serialized, cacheKeys, cached } from '../../utils/cache';
import { NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { assertDriver, assertManager } from '../../utils/permissions';

/**
 * busy while a shipment is ASSIGNED or IN_TRANSIT; otherwise available when the
 * driver says so or has just delivered, unavailable when neither holds
 */
export const availabilityOf = (
  activity: Pick<DriverActivity, 'is_active' | 'last_status' | 'current_active_shipment_id'>
): DriverAvailability => {
  if (activity.current_active_shipment_id !== null) {
    return DRIVER_AVAILABILITY.BUSY;
  }
  if (activity.is_active || activity.last_status === SHIPMENT_STATUS.DELIVERED) {
    return DRIVER_AVAILABILITY.AVAILABLE;
  }
  return DRIVER_AVAILABILITY.UNAVAILABLE;
};

const toBoardEntry = (activity: DriverActivity): DriverBoardEntry => ({
  id: activity.id,
  user_id: activity.user_id,
  username: activity.username,
  phone: activity.phone,
  is_active: activity.is_active,
  availability: availabilityOf(activity),
  last_status: activity.last_status,
  last_seen_at: activity.last_seen_at,
  current_active_shipment_id: activity.current_active_shipment_id,
});

export const createDriversService = ({ db, cache }: AppContext) => {
  const loadActivity = async (driverId: number): Promise<DriverActivity> => {
    const activity = await db.store.drivers.findActivity(driverId);
    if (!activity) {
      throw new NotFoundError('Driver', driverId);
    }
    return activity;
  };

  const statusView = (activity: DriverActivity): DriverStatusView => ({
    driver_id: activity.id,
    is_active: activity.is_active,
    availability: availabilityOf(activity),
  });

  return {
    async board(actor: Actor): Promise<Serialized<DriverBoardEntry[]>> {
      assertManager(actor, 'view the driver board');
      return cached(cache, cacheKeys.driverBoard(), async () =>
        (await db.store.drivers.listActivity()).map(toBoardEntry)
      );
    },

    async detail(actor: Actor, driverId: number): Promise<DriverBoardEntry> {
      assertManager(actor, 'view drivers');
      return toBoardEntry(await loadActivity(driverId));
    },

    async getOwnStatus(actor: Actor): Promise<DriverStatusView> {
      const driver = assertDriver(actor, 'view their availability');
      return statusView(await loadActivity(driver.driverId));
    },

    async setOwnStatus(actor: Actor, isActive: boolean): Promise<DriverStatusView> {
      const driver = assertDriver(actor, 'change their availability');

      const updated = await db.store.drivers.setActive(driver.driverId, isActive);
      if (!updated) {
        throw new NotFoundError('Driver', driver.driverId);
      }

      auditLog('driver.availability_changed', { driver_id: driver.driverId, is_active: isActive });
      await cache.invalidate(cacheKeys.driverBoard());
      return statusView(await loadActivity(driver.driverId));
    },

    async listOwnShipments(actor: Actor): Promise<Serialized<ShipmentSummary[]>> {
      const driver = assertDriver(actor, 'view their shipments');
      return cached(cache, cacheKeys.driverShipments(driver.driverId), () =>
        db.store.shipments.listByDriver(driver.driverId)
      );
    },
  };
};

export type DriversService = ReturnType<typeof createDriversService>;
