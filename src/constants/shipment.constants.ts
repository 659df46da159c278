/**
 * Shipment Status Constants
 */
export const SHIPMENT_STATUS = {
  NEW: 'NEW',
  ASSIGNED: 'ASSIGNED',
  IN_TRANSIT: 'IN_TRANSIT',
  DELIVERED: 'DELIVERED',
} as const;

export type ShipmentStatus = typeof SHIPMENT_STATUS[keyof typeof SHIPMENT_STATUS];

export const SHIPMENT_STATUSES = [
  SHIPMENT_STATUS.NEW,
  SHIPMENT_STATUS.ASSIGNED,
  SHIPMENT_STATUS.IN_TRANSIT,
  SHIPMENT_STATUS.DELIVERED,
] as const;

/**
 * Statuses in which a shipment keeps its driver busy
 */
export const ACTIVE_SHIPMENT_STATUSES: readonly ShipmentStatus[] = [
  SHIPMENT_STATUS.ASSIGNED,
  SHIPMENT_STATUS.IN_TRANSIT,
];

export const DEFAULT_SHIPMENT_QUANTITY = 1;

// Largest value the INTEGER quantity and stock_qty columns hold
export const MAX_QUANTITY = 2147483647;

// SERIAL ids share the INTEGER range
export const MAX_ROW_ID = 2147483647;

export const AUTOCOMPLETE_LIMIT = 20;

/**
 * Driver availability labels shown on the manager board
 */
export const DRIVER_AVAILABILITY = {
  AVAILABLE: 'available',
  BUSY: 'busy',
  UNAVAILABLE: 'unavailable',
} as const;

export type DriverAvailability = typeof DRIVER_AVAILABILITY[keyof typeof DRIVER_AVAILABILITY];
