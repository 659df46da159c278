import { NextFunction, Response } from 'express';
import { requireActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { parseIdParam } from '../../utils/validation';
import { StatusUpdatesService } from './status-updates.service';
import { createStatusUpdateSchema } from './status-updates.validation';

export const createStatusUpdatesController = (service: StatusUpdatesService) => ({
  createStatusUpdate: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const input = createStatusUpdateSchema.parse(req.body);
      const statusUpdate = await service.create(requireActor(req), input);
      return ResponseHandler.created(res, statusUpdate, 'Status update recorded');
    } catch (error) {
      next(error);
    }
  },

  deleteStatusUpdate: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      await service.delete(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },
});
