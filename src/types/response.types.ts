import { DriverAvailability, ShipmentStatus } from '../constants';

/**
 * Response projections that are not a single table row
 */

export interface DriverBoardEntry {
  id: number;
  user_id: number;
  username: string;
  phone: string;
  is_active: boolean;
  availability: DriverAvailability;
  last_status: ShipmentStatus | null;
  last_seen_at: Date | null;
  current_active_shipment_id: number | null;
}

export interface DriverStatusView {
  driver_id: number;
  is_active: boolean;
  availability: DriverAvailability;
}

export interface CustomerAddresses {
  customer_id: number;
  addresses: string[];
}
