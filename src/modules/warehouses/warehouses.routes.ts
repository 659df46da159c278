import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { AppContext } from '../../types/context.types';
import { createWarehousesController } from './warehouses.controller';
import { createWarehousesService } from './warehouses.service';

export const createWarehousesRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const warehousesController = createWarehousesController(createWarehousesService(ctx));

  router.use(authenticate, requireRole(USER_ROLE.MANAGER));

  router.get('/', warehousesController.getWarehouses);
  router.post('/', warehousesController.createWarehouse);
  router.get('/:id', warehousesController.getWarehouseById);
  router.patch('/:id', warehousesController.updateWarehouse);
  router.delete('/:id', warehousesController.deleteWarehouse);

  return router;
};
