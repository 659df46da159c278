import { NextFunction, Response } from 'express';
import { requireActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { parseIdParam } from '../../utils/validation';
import { ProductsService } from './products.service';
import { createProductSchema, restockSchema, updateProductSchema } from './products.validation';

export const createProductsController = (service: ProductsService) => ({
  getProducts: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const products = await service.list(requireActor(req));
      return ResponseHandler.success(res, products, 'Products retrieved', 200, { count: products.length });
    } catch (error) {
      next(error);
    }
  },

  getProductById: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const product = await service.get(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, product, 'Product retrieved');
    } catch (error) {
      next(error);
    }
  },

  createProduct: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const input = createProductSchema.parse(req.body);
      const product = await service.create(requireActor(req), input);
      return ResponseHandler.created(res, product, 'Product created');
    } catch (error) {
      next(error);
    }
  },

  updateProduct: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const input = updateProductSchema.parse(req.body);
      const product = await service.update(requireActor(req), id, input);
      return ResponseHandler.success(res, product, 'Product updated');
    } catch (error) {
      next(error);
    }
  },

  restockProduct: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const { quantity } = restockSchema.parse(req.body);
      const result = await service.restock(requireActor(req), id, quantity);
      return ResponseHandler.success(res, result, 'Stock added');
    } catch (error) {
      next(error);
    }
  },

  deleteProduct: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      await service.delete(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },
});
