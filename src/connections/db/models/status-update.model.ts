import { ShipmentStatus } from '../../../constants';

export interface StatusUpdate {
  id: number;
  shipment_id: number;
  status: ShipmentStatus;
  timestamp: Date; // server assigned
  note: string;
  photo_url: string | null;
  latitude: string | null; // numeric(9,6)
  longitude: string | null;
  location_accuracy_m: number | null;
}

export interface CreateStatusUpdateRow {
  shipment_id: number;
  status: ShipmentStatus;
  note: string;
  photo_url: string | null;
  latitude: number | null;
  longitude: number | null;
  location_accuracy_m: number | null;
}
