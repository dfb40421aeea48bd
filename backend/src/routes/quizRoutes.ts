import { Router } from 'express';
import { QuizController } from '../controllers/quizController';
import { methodNotAllowed } from '../middlewares/errorHandler';

export const createQuizRoutes = (controller: QuizController): Router => {
  const router = Router();

  router.route('/').post(controller.playQuiz).all(methodNotAllowed);

  return router;
};
