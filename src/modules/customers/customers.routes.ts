import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { AppContext } from '../../types/context.types';
import { createCustomersController } from './customers.controller';
import { createCustomersService } from './customers.service';

export const createCustomersRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const customersController = createCustomersController(createCustomersService(ctx));

  router.use(authenticate, requireRole(USER_ROLE.MANAGER));

  router.get('/', customersController.getCustomers);
  router.post('/', customersController.createCustomer);
  router.get('/autocomplete', customersController.autocompleteCustomers);
  router.get('/:id', customersController.getCustomerById);
  router.patch('/:id', customersController.updateCustomer);
  router.delete('/:id', customersController.deleteCustomer);
  router.get('/:id/addresses', customersController.getCustomerAddresses);

  return router;
};
