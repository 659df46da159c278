import { ProductRepository } from '../../connections/db/repositories';
import { appConfig } from '../../connections/config/app.config';
import { MAX_QUANTITY } from '../../constants';
import {
  InsufficientStockError,
  InvalidQuantityError,
  NotFoundError,
  StockLimitExceededError,
} from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';

/**
 * Stock ledger over `products.stock_qty`.
 *
 * Reservations are a single conditional decrement, so two concurrent
 * reservations can never both pass the availability check. There is no
 * reservation table: a shipment holding stock is the only record of it.
 * Callers run these inside the transaction that writes the shipment row.
 */
export const isValidQuantity = (qty: number): boolean => Number.isInteger(qty) && qty > 0 && qty <= MAX_QUANTITY;

export interface InventoryLedger {
  reserve(productId: number, qty: number): Promise<number>;
  release(productId: number, qty: number): Promise<number | null>;
  /** Row-lock products in ascending id order for the rest of the transaction */
  lock(productIds: number[]): Promise<void>;
}

export const createInventoryLedger = (
  products: ProductRepository,
  lowStockThreshold: number = appConfig.lowStockThreshold
): InventoryLedger => ({
  /**
   * Take `qty` units out of stock. Resolves the remaining stock.
   */
  async reserve(productId, qty) {
    if (!isValidQuantity(qty)) {
      throw new InvalidQuantityError(qty);
    }

    const remaining = await products.decrementStockIfAvailable(productId, qty);

    if (remaining === null) {
      const available = await products.getStock(productId);
      if (available === null) {
        throw new NotFoundError('Product', productId);
      }
      throw new InsufficientStockError(productId, available, qty);
    }

    auditLog('stock.reserved', { product_id: productId, quantity: qty, stock_qty: remaining });

    if (remaining < lowStockThreshold) {
      logger.warn('Product stock is running low', {
        product_id: productId,
        stock_qty: remaining,
        threshold: lowStockThreshold,
      });
    }

    return remaining;
  },

  /**
   * Return `qty` units to stock. Non-positive quantities are a no-op and resolve null.
   */
  async release(productId, qty) {
    if (qty <= 0) {
      return null;
    }
    if (!isValidQuantity(qty)) {
      throw new InvalidQuantityError(qty);
    }

    const stock = await products.incrementStock(productId, qty);
    if (stock === null) {
      const current = await products.getStock(productId);
      if (current === null) {
        throw new NotFoundError('Product', productId);
      }
      throw new StockLimitExceededError(productId, current, qty);
    }

    auditLog('stock.released', { product_id: productId, quantity: qty, stock_qty: stock });
    return stock;
  },

  async lock(productIds) {
    await products.lockForUpdate([...productIds].sort((a, b) => a - b));
  },
});
