import { SHIPMENT_STATUS, SHIPMENT_STATUSES, ShipmentStatus } from '../../constants';
import { InvalidTransitionError } from '../../utils/errors';

/**
 * Legal moves of a shipment's status. Status updates may step back one stage
 * (a failed pickup, a turned-back delivery); DELIVERED is final.
 */
const TRANSITIONS: Record<ShipmentStatus, readonly ShipmentStatus[]> = {
  [SHIPMENT_STATUS.NEW]: [SHIPMENT_STATUS.ASSIGNED],
  [SHIPMENT_STATUS.ASSIGNED]: [SHIPMENT_STATUS.IN_TRANSIT, SHIPMENT_STATUS.NEW],
  [SHIPMENT_STATUS.IN_TRANSIT]: [SHIPMENT_STATUS.DELIVERED, SHIPMENT_STATUS.ASSIGNED],
  [SHIPMENT_STATUS.DELIVERED]: [],
};

export const isShipmentStatus = (value: unknown): value is ShipmentStatus =>
  typeof value === 'string' && SHIPMENT_STATUSES.some(status => status === value);

export const allowedTransitions = (from: ShipmentStatus): readonly ShipmentStatus[] => TRANSITIONS[from];

export const canTransition = (from: ShipmentStatus, to: ShipmentStatus): boolean =>
  TRANSITIONS[from].includes(to);

export const isTerminal = (status: ShipmentStatus): boolean => TRANSITIONS[status].length === 0;

export const validateTransition = (from: ShipmentStatus, to: ShipmentStatus): void => {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to, allowedTransitions(from));
  }
};
