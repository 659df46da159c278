import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { AppContext } from '../../types/context.types';
import { createShipmentsController } from './shipments.controller';
import { createShipmentsService } from './shipments.service';

export const createShipmentsRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const shipmentsController = createShipmentsController(createShipmentsService(ctx));

  // Shipment management (warehouse managers only)
  router.use(authenticate, requireRole(USER_ROLE.MANAGER));

  router.get('/', shipmentsController.getShipments);
  router.post('/', shipmentsController.createShipment);
  router.get('/autocomplete', shipmentsController.autocompleteShipments);
  router.get('/:id', shipmentsController.getShipmentById);
  router.patch('/:id', shipmentsController.updateShipment);
  router.delete('/:id', shipmentsController.deleteShipment);
  router.get('/:id/status-updates', shipmentsController.getShipmentStatusUpdates);

  return router;
};
