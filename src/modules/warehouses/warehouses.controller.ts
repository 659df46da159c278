import { NextFunction, Response } from 'express';
import { requireActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { parseIdParam } from '../../utils/validation';
import { WarehousesService } from './warehouses.service';
import { createWarehouseSchema, updateWarehouseSchema } from './warehouses.validation';

export const createWarehousesController = (service: WarehousesService) => ({
  getWarehouses: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const warehouses = await service.list(requireActor(req));
      return ResponseHandler.success(res, warehouses, 'Warehouses retrieved', 200, { count: warehouses.length });
    } catch (error) {
      next(error);
    }
  },

  getWarehouseById: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const warehouse = await service.get(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, warehouse, 'Warehouse retrieved');
    } catch (error) {
      next(error);
    }
  },

  createWarehouse: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const input = createWarehouseSchema.parse(req.body);
      const warehouse = await service.create(requireActor(req), input);
      return ResponseHandler.created(res, warehouse, 'Warehouse created');
    } catch (error) {
      next(error);
    }
  },

  updateWarehouse: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const input = updateWarehouseSchema.parse(req.body);
      const warehouse = await service.update(requireActor(req), id, input);
      return ResponseHandler.success(res, warehouse, 'Warehouse updated');
    } catch (error) {
      next(error);
    }
  },

  deleteWarehouse: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      await service.delete(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },
});
