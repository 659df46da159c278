import { ShipmentStatus } from '../../../constants';

export interface Shipment {
  id: number;
  product_id: number;
  warehouse_id: number;
  driver_id: number | null; // null = unassigned, holds no stock
  customer_id: number | null;
  customer_address: string | null;
  notes: string;
  quantity: number; // default: 1
  current_status: ShipmentStatus; // derived from status_updates, never client-editable
  assigned_at: Date;
  created_at: Date;
  updated_at: Date;
}

export interface ShipmentSummary extends Shipment {
  product_name: string;
  customer_name: string | null;
  driver_username: string | null;
}

export interface CreateShipmentRow {
  product_id: number;
  warehouse_id: number;
  driver_id: number | null;
  customer_id: number | null;
  customer_address: string | null;
  notes: string;
  quantity: number;
}

export type UpdateShipmentRow = CreateShipmentRow & {
  // assigned_at is restamped with the database clock when true
  reassigned: boolean;
};
