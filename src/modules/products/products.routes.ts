import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { AppContext } from '../../types/context.types';
import { createProductsController } from './products.controller';
import { createProductsService } from './products.service';

export const createProductsRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();
  const productsController = createProductsController(createProductsService(ctx));

  // Product catalog management (warehouse managers only)
  router.use(authenticate, requireRole(USER_ROLE.MANAGER));

  router.get('/', productsController.getProducts);
  router.post('/', productsController.createProduct);
  router.get('/:id', productsController.getProductById);
  router.patch('/:id', productsController.updateProduct);
  router.post('/:id/restock', productsController.restockProduct);
  router.delete('/:id', productsController.deleteProduct);

  return router;
};
