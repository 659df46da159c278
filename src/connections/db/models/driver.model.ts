import { ShipmentStatus } from '../../../constants';

export interface Driver {
  id: number;
  user_id: number;
  is_active: boolean; // true = available, false = busy (driver controlled)
}

export interface DriverProfile extends Driver {
  username: string;
  phone: string;
}

/**
 * Driver row with the activity the availability board is computed from
 */
export interface DriverActivity extends DriverProfile {
  last_status: ShipmentStatus | null;
  last_seen_at: Date | null;
  current_active_shipment_id: number | null;
}
