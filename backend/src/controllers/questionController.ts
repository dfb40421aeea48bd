import { Request, Response, NextFunction } from 'express';
import { TriviaRepository } from '../repositories/types';
import { ApiError } from '../middlewares/errorHandler';
import { createQuestionSchema, pageQuerySchema, searchQuestionsSchema } from '../schemas/trivia.schema';
import { pageWindow } from '../utils/pagination';
import { parseIdParam, toCategoryMap } from '../utils/format';

export class QuestionController {
  constructor(private readonly repository: TriviaRepository) {}

  listQuestions = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { page } = pageQuerySchema.parse(req.query);
      const { offset, limit } = pageWindow(page);

      const [{ questions, total }, categories] = await Promise.all([
        this.repository.listQuestions(offset, limit),
        this.repository.listCategories(),
      ]);

      if (questions.length === 0) {
        throw new ApiError(404, `Page ${page} has no questions`);
      }

      res.json({
        success: true,
        questions,
        total_questions: total,
        categories: toCategoryMap(categories),
        current_category: null,
      });
    } catch (error) {
      next(error);
    }
  };

  deleteQuestion = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params.id);

      const deleted = await this.repository.deleteQuestion(id);
      if (!deleted) {
        throw new ApiError(404, `Question ${id} not found`);
      }

      console.log(`🗑️  Question ${id} deleted`);
      res.json({ success: true, id });
    } catch (error) {
      next(error);
    }
  };

  createQuestion = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = createQuestionSchema.parse(req.body);
      const question = await this.repository.insertQuestion(data);

      console.log(`✓ Question ${question.id} created in category ${question.category}`);
      res.json({ success: true, created: question.id });
    } catch (error) {
      next(error);
    }
  };

  searchQuestions = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { search_term } = searchQuestionsSchema.parse(req.body);
      const questions = await this.repository.searchQuestions(search_term);

      res.json({
        success: true,
        questions,
        total_questions: questions.length,
        current_category: null,
      });
    } catch (error) {
      next(error);
    }
  };
}
