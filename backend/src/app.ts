import express, { Application } from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import { TriviaRepository } from './repositories/types';
import { QuestionController } from './controllers/questionController';
import { CategoryController } from './controllers/categoryController';
import { QuizController } from './controllers/quizController';
import { createQuestionRoutes } from './routes/questionRoutes';
import { createCategoryRoutes } from './routes/categoryRoutes';
import { createQuizRoutes } from './routes/quizRoutes';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { requestLogger } from './middlewares/requestLogger';

export const API_PREFIX = '/api/v1.0';

export const createApp = (config: AppConfig, repository: TriviaRepository): Application => {
  const app = express();

  // Middleware
  app.use(cors(config.cors));
  if (config.logRequests) {
    app.use(requestLogger);
  }
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use(`${API_PREFIX}/questions`, createQuestionRoutes(new QuestionController(repository)));
  app.use(`${API_PREFIX}/categories`, createCategoryRoutes(new CategoryController(repository)));
  app.use(`${API_PREFIX}/quizzes`, createQuizRoutes(new QuizController(repository)));

  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};
