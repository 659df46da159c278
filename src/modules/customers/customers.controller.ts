import { NextFunction, Response } from 'express';
import { requireActor } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { parseIdParam, parseSearchTerm } from '../../utils/validation';
import { CustomersService } from './customers.service';
import { createCustomerSchema, updateCustomerSchema } from './customers.validation';

export const createCustomersController = (service: CustomersService) => ({
  getCustomers: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const customers = await service.list(requireActor(req));
      return ResponseHandler.success(res, customers, 'Customers retrieved', 200, { count: customers.length });
    } catch (error) {
      next(error);
    }
  },

  autocompleteCustomers: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const customers = await service.autocomplete(requireActor(req), parseSearchTerm(req.query));
      return ResponseHandler.success(res, customers, 'Customers retrieved', 200, { count: customers.length });
    } catch (error) {
      next(error);
    }
  },

  getCustomerById: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const customer = await service.get(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, customer, 'Customer retrieved');
    } catch (error) {
      next(error);
    }
  },

  createCustomer: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const input = createCustomerSchema.parse(req.body);
      const customer = await service.create(requireActor(req), input);
      return ResponseHandler.created(res, customer, 'Customer created');
    } catch (error) {
      next(error);
    }
  },

  updateCustomer: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const input = updateCustomerSchema.parse(req.body);
      const customer = await service.update(requireActor(req), id, input);
      return ResponseHandler.success(res, customer, 'Customer updated');
    } catch (error) {
      next(error);
    }
  },

  deleteCustomer: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      await service.delete(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },

  getCustomerAddresses: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const addresses = await service.addresses(requireActor(req), parseIdParam(req.params));
      return ResponseHandler.success(res, addresses, 'Customer addresses retrieved');
    } catch (error) {
      next(error);
    }
  },
});
