import { Router } from 'express';
import { QuestionController } from '../controllers/questionController';
import { methodNotAllowed } from '../middlewares/errorHandler';

export const createQuestionRoutes = (controller: QuestionController): Router => {
  const router = Router();

  // Paginated question list (10 per page) and question creation
  router.route('/').get(controller.listQuestions).post(controller.createQuestion).all(methodNotAllowed);

  // Substring search on question text
  router.route('/search').post(controller.searchQuestions).all(methodNotAllowed);

  router.route('/:id').delete(controller.deleteQuestion).all(methodNotAllowed);

  return router;
};
