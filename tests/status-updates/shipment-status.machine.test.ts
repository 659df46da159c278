import { describe, expect, it } from 'vitest';
import { SHIPMENT_STATUSES } from '../../src/constants';
import {
  allowedTransitions,
  canTransition,
  isShipmentStatus,
  isTerminal,
  validateTransition,
} from '../../src/modules/status-updates/shipment-status.machine';
import { InvalidTransitionError } from '../../src/utils/errors';

describe('shipment status machine', () => {
  it('allows the forward path and one-step rollbacks', () => {
    expect(allowedTransitions('NEW')).toEqual(['ASSIGNED']);
    expect(allowedTransitions('ASSIGNED')).toEqual(['IN_TRANSIT', 'NEW']);
    expect(allowedTransitions('IN_TRANSIT')).toEqual(['DELIVERED', 'ASSIGNED']);
    expect(allowedTransitions('DELIVERED')).toEqual([]);
  });

  it('only ever targets known statuses', () => {
    for (const from of SHIPMENT_STATUSES) {
      for (const to of allowedTransitions(from)) {
        expect(isShipmentStatus(to)).toBe(true);
      }
    }
  });

  it('treats DELIVERED as the only terminal status', () => {
    expect(SHIPMENT_STATUSES.filter(isTerminal)).toEqual(['DELIVERED']);
  });

  it('rejects skipping straight to DELIVERED', () => {
    expect(canTransition('NEW', 'DELIVERED')).toBe(false);

    expect(() => validateTransition('NEW', 'DELIVERED')).toThrow(
      'Invalid status transition from NEW to DELIVERED. Allowed: ASSIGNED'
    );
  });

  it('rejects leaving DELIVERED with an empty allowed list', () => {
    try {
      validateTransition('DELIVERED', 'ASSIGNED');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTransitionError);
      expect(err).toMatchObject({
        code: 'INVALID_TRANSITION',
        message: 'Invalid status transition from DELIVERED to ASSIGNED. Allowed: none',
        details: { from: 'DELIVERED', to: 'ASSIGNED', allowed: [] },
      });
    }
  });

  it('rejects staying in the same status', () => {
    for (const status of SHIPMENT_STATUSES) {
      expect(canTransition(status, status)).toBe(false);
    }
  });

  it('recognises status strings', () => {
    expect(isShipmentStatus('IN_TRANSIT')).toBe(true);
    expect(isShipmentStatus('in_transit')).toBe(false);
    expect(isShipmentStatus(3)).toBe(false);
  });
});
