import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { AppContext } from '../../types/context.types';
import { createDriversController } from './drivers.controller';
import { createDriversService } from './drivers.service';

// Manager view of every driver: mounted at /drivers
export const createDriversRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const driversController = createDriversController(createDriversService(ctx));

  router.use(authenticate, requireRole(USER_ROLE.MANAGER));

  router.get('/', driversController.getDriverBoard);
  router.get('/:id', driversController.getDriverById);

  return router;
};

// The calling driver's own endpoints: mounted at /driver
export const createDriverSelfRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const driversController = createDriversController(createDriversService(ctx));

  router.use(authenticate, requireRole(USER_ROLE.DRIVER));

  router.get('/status', driversController.getOwnStatus);
  router.patch('/status', driversController.updateOwnStatus);
  router.get('/shipments', driversController.getOwnShipments);

  return router;
};
