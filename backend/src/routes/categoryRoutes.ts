import { Router } from 'express';
import { CategoryController } from '../controllers/categoryController';
import { methodNotAllowed } from '../middlewares/errorHandler';

export const createCategoryRoutes = (controller: CategoryController): Router => {
  const router = Router();

  router.route('/').get(controller.listCategories).all(methodNotAllowed);

  router.route('/:id/questions').get(controller.listQuestionsByCategory).all(methodNotAllowed);

  return router;
};
