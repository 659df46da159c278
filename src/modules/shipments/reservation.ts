import { InventoryLedger } from '../inventory/inventory.ledger';

/**
 * The part of a shipment that decides how much stock it holds.
 * Only a shipment with a driver holds stock.
 */
export interface StockHold {
  driverId: number | null;
  productId: number;
  quantity: number;
}

export type LedgerStep =
  | { kind: 'reserve'; productId: number; quantity: number }
  | { kind: 'release'; productId: number; quantity: number };

const holdsStock = (hold: StockHold | null): hold is StockHold => hold !== null && hold.driverId !== null;

/**
 * Ledger calls that move stock from what `previous` holds to what `next` holds.
 * `previous` is null for a new shipment, `next` is null for a deleted one.
 * Releases come before reserves, and an unchanged hold plans nothing.
 */
export const planReservation = (previous: StockHold | null, next: StockHold | null): LedgerStep[] => {
  const before = holdsStock(previous) ? previous : null;
  const after = holdsStock(next) ? next : null;

  if (!before) {
    return after ? [{ kind: 'reserve', productId: after.productId, quantity: after.quantity }] : [];
  }

  if (!after) {
    return [{ kind: 'release', productId: before.productId, quantity: before.quantity }];
  }

  if (before.productId !== after.productId) {
    return [
      { kind: 'release', productId: before.productId, quantity: before.quantity },
      { kind: 'reserve', productId: after.productId, quantity: after.quantity },
    ];
  }

  const delta = after.quantity - before.quantity;
  if (delta > 0) return [{ kind: 'reserve', productId: after.productId, quantity: delta }];
  if (delta < 0) return [{ kind: 'release', productId: after.productId, quantity: -delta }];
  return [];
};

/**
 * Products whose stock a plan touches
 */
export const touchedProducts = (steps: LedgerStep[]): number[] => [...new Set(steps.map(step => step.productId))];

/**
 * Run the planned steps. A plan over two products locks both rows in id order
 * first, so opposite product swaps cannot deadlock.
 */
export const applyReservation = async (ledger: InventoryLedger, steps: LedgerStep[]): Promise<void> => {
  const products = touchedProducts(steps);
  if (products.length > 1) {
    await ledger.lock(products);
  }

  for (const step of steps) {
    if (step.kind === 'reserve') {
      await ledger.reserve(step.productId, step.quantity);
    } else {
      await ledger.release(step.productId, step.quantity);
    }
  }
};
