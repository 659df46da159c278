import { NextFunction, Response } from 'express';
import { requireActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { parseIdParam, parseSearchTerm } from '../../utils/validation';
import { ShipmentsService } from './shipments.service';
import { createShipmentSchema, shipmentListQuerySchema, updateShipmentSchema } from './shipments.validation';

export const createShipmentsController = (service: ShipmentsService) => ({
  getShipments: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const query = shipmentListQuerySchema.parse(req.query);
      const shipments = await service.list(requireActor(req), { updatedSince: query.updated_since });
      return ResponseHandler.success(res, shipments, 'Shipments retrieved', 200, { count: shipments.length });
    } catch (error) {
      next(error);
    }
  },

  autocompleteShipments: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const shipments = await service.autocomplete(requireActor(req), parseSearchTerm(req.query));
      return ResponseHandler.success(res, shipments, 'Shipments retrieved', 200, { count: shipments.length });
    } catch (error) {
      next(error);
    }
  },

  getShipmentById: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const shipment = await service.get(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, shipment, 'Shipment retrieved');
    } catch (error) {
      next(error);
    }
  },

  createShipment: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const input = createShipmentSchema.parse(req.body);
      const shipment = await service.create(requireActor(req), input);
      return ResponseHandler.created(res, shipment, 'Shipment created');
    } catch (error) {
      next(error);
    }
  },

  updateShipment: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const patch = updateShipmentSchema.parse(req.body);
      const shipment = await service.update(requireActor(req), id, patch);
      return ResponseHandler.success(res, shipment, 'Shipment updated');
    } catch (error) {
      next(error);
    }
  },

  deleteShipment: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      await service.delete(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },

  getShipmentStatusUpdates: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const history = await service.listStatusUpdates(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, history, 'Status history retrieved');
    } catch (error) {
      next(error);
    }
  },
});
