import { NextFunction, Response } from 'express';
import { requireActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { parseIdParam } from '../../utils/validation';
import { DriversService } from './drivers.service';
import { driverStatusSchema } from './drivers.validation';

export const createDriversController = (service: DriversService) => ({
  getDriverBoard: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const drivers = await service.board(requireActor(req));
      return ResponseHandler.success(res, drivers, 'Drivers retrieved', 200, { count: drivers.length });
    } catch (error) {
      next(error);
    }
  },

  getDriverById: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const driver = await service.detail(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, driver, 'Driver retrieved');
    } catch (error) {
      next(error);
    }
  },

  getOwnStatus: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const status = await service.getOwnStatus(requireActor(req));
      return ResponseHandler.success(res, status, 'Driver status retrieved');
    } catch (error) {
      next(error);
    }
  },

  updateOwnStatus: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { is_active } = driverStatusSchema.parse(req.body);
      const status = await service.setOwnStatus(requireActor(req), is_active);
      return ResponseHandler.success(res, status, 'Driver status updated');
    } catch (error) {
      next(error);
    }
  },

  getOwnShipments: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const shipments = await service.listOwnShipments(requireActor(req));
      return ResponseHandler.success(res, shipments, 'Shipments retrieved', 200, { count: shipments.length });
    } catch (error) {
      next(error);
    }
  },
});
