import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { AppContext } from '../../types/context.types';
import { createStatusUpdatesController } from './status-updates.controller';
import { createStatusUpdatesService } from './status-updates.service';

export const createStatusUpdatesRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const statusUpdatesController = createStatusUpdatesController(createStatusUpdatesService(ctx));

  router.post('/', authenticate, requireRole(USER_ROLE.DRIVER), statusUpdatesController.createStatusUpdate);
  router.delete('/:id', authenticate, requireRole(USER_ROLE.MANAGER), statusUpdatesController.deleteStatusUpdate);

  return router;
};
