import { Product, ProductWithUsage } from '../../connections/db/models';
import { AppContext } from '../../types/context.types';
import { Actor } from '../../types/request.types';
import { ConflictError, InvalidQuantityError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { assertManager } from '../../utils/permissions';
import { createInventoryLedger, isValidQuantity } from '../inventory/inventory.ledger';
import { CreateProductBody, UpdateProductBody } from './products.validation';

export interface RestockResult {
  product_id: number;
  quantity_added: number;
  stock_qty: number;
}

export const createProductsService = ({ db }: AppContext) => ({
  async list(actor: Actor): Promise<ProductWithUsage[]> {
    assertManager(actor, 'list products');
    return db.store.products.list();
  },

  async get(actor: Actor, id: number): Promise<ProductWithUsage> {
    assertManager(actor, 'view products');
    const product = await db.store.products.findById(id);
    if (!product) {
      throw new NotFoundError('Product', id);
    }
    return product;
  },

  async create(actor: Actor, input: CreateProductBody): Promise<Product> {
    assertManager(actor, 'create products');
    const product = await db.store.products.create(input);
    auditLog('product.created', { product_id: product.id, stock_qty: product.stock_qty, user_id: actor.userId });
    return product;
  },

  async update(actor: Actor, id: number, input: UpdateProductBody): Promise<Product> {
    assertManager(actor, 'update products');
    const product = await db.store.products.update(id, input);
    if (!product) {
      throw new NotFoundError('Product', id);
    }
    return product;
  },

  async delete(actor: Actor, id: number): Promise<void> {
    assertManager(actor, 'delete products');

    await db.transaction(async (store) => {
      if (!(await store.products.findById(id))) {
        throw new NotFoundError('Product', id);
      }

      const shipmentsCount = await store.shipments.countByProduct(id);
      if (shipmentsCount > 0) {
        throw new ConflictError('Product is referenced by shipments and cannot be deleted', {
          product_id: id,
          shipments_count: shipmentsCount,
        });
      }

      await store.products.delete(id);
    });

    auditLog('product.deleted', { product_id: id, user_id: actor.userId });
  },

  /**
   * Add stock through the ledger's increment, never by assigning stock_qty
   */
  async restock(actor: Actor, id: number, quantity: number): Promise<RestockResult> {
    assertManager(actor, 'restock products');
    if (!isValidQuantity(quantity)) {
      throw new InvalidQuantityError(quantity);
    }

    return db.transaction(async (store) => {
      const stock = await createInventoryLedger(store.products).release(id, quantity);
      if (stock === null) {
        throw new NotFoundError('Product', id);
      }
      return { product_id: id, quantity_added: quantity, stock_qty: stock };
    });
  },
});

export type ProductsService = ReturnType<typeof createProductsService>;
