import { Request, Response, NextFunction } from 'express';
import { TriviaRepository } from '../repositories/types';
import { playQuizSchema } from '../schemas/trivia.schema';

export class QuizController {
  constructor(private readonly repository: TriviaRepository) {}

  /**
   * Next quiz question: random, never one of `previous_questions`, and
   * limited to `quiz_category.id` unless that id is 0. Responds with
   * `question: null` when the candidates are exhausted.
   */
  playQuiz = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { quiz_category, previous_questions } = playQuizSchema.parse(req.body);
      const categoryId = quiz_category.id > 0 ? quiz_category.id : undefined;

      const question = await this.repository.pickRandomQuestion(categoryId, previous_questions);

      res.json({ success: true, question });
    } catch (error) {
      next(error);
    }
  };
}
