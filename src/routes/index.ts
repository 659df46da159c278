import express from 'express';
import { createAuthenticate } from '../middlewares/auth.middleware';
import { AppContext } from '../types/context.types';
import { createCustomersRoutes } from '../modules/customers/customers.routes';
import { createDriverSelfRoutes, createDriversRoutes } from '../modules/drivers/drivers.routes';
import { createProductsRoutes } from '../modules/products/products.routes';
import { createShipmentsRoutes } from '../modules/shipments/shipments.routes';
import { createStatusUpdatesRoutes } from '../modules/status-updates/status-updates.routes';
import { createWarehousesRoutes } from '../modules/warehouses/warehouses.routes';

export const createRoutes = (ctx: AppContext) => {
  const router = express.Router();
  const authenticate = createAuthenticate(ctx.db);

  // API Routes
  router.use('/products', createProductsRoutes(ctx, authenticate));
  router.use('/warehouses', createWarehousesRoutes(ctx, authenticate));
  router.use('/customers', createCustomersRoutes(ctx, authenticate));
  router.use('/shipments', createShipmentsRoutes(ctx, authenticate));
  router.use('/status-updates', createStatusUpdatesRoutes(ctx, authenticate));
  router.use('/drivers', createDriversRoutes(ctx, authenticate));
  router.use('/driver', createDriverSelfRoutes(ctx, authenticate));

  return router;
};
