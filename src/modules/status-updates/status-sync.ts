import { DataStore } from '../../connections/db/store';
import { SHIPMENT_STATUS, ShipmentStatus } from '../../constants';
import { auditLog } from '../../utils/logging';

/**
 * Recompute a shipment's current_status from its latest status update
 * (NEW when none remain) and write it back only when it changed.
 * Runs inside the transaction that created or deleted the update.
 */
export const syncShipmentStatus = async (store: DataStore, shipmentId: number): Promise<ShipmentStatus | null> => {
  const shipment = await store.shipments.findById(shipmentId);
  if (!shipment) return null;

  const latest = await store.statusUpdates.findLatestForShipment(shipmentId);
  const effective = latest?.status ?? SHIPMENT_STATUS.NEW;

  if (effective !== shipment.current_status) {
    await store.shipments.updateStatus(shipmentId, effective);
    auditLog('shipment.status_changed', {
      shipment_id: shipmentId,
      from: shipment.current_status,
      to: effective,
    });
  }

  return effective;
};
