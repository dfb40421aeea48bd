import { Request, Response, NextFunction } from 'express';
import { TriviaRepository } from '../repositories/types';
import { ApiError } from '../middlewares/errorHandler';
import { parseIdParam, toCategoryMap } from '../utils/format';

export class CategoryController {
  constructor(private readonly repository: TriviaRepository) {}

  listCategories = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const categories = await this.repository.listCategories();

      res.json({
        success: true,
        categories: toCategoryMap(categories),
        total_categories: categories.length,
      });
    } catch (error) {
      next(error);
    }
  };

  listQuestionsByCategory = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params.id);

      const category = await this.repository.findCategoryById(id);
      if (!category) {
        throw new ApiError(404, `Category ${id} not found`);
      }

      const questions = await this.repository.listQuestionsByCategory(id);

      res.json({
        success: true,
        questions,
        total_questions: questions.length,
        current_category: category.type,
      });
    } catch (error) {
      next(error);
    }
  };
}
