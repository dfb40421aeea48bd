import { FilterQuery } from 'mongoose';
import Question, { IQuestion } from '../models/Question';
import Category from '../models/Category';
import { nextSequence } from '../models/Counter';
import { CategoryRecord, NewQuestion, QuestionPage, QuestionRecord } from '../models/types';
import { ApiError, StoreRejectedError } from '../middlewares/errorHandler';
import { TriviaRepository } from './types';

export const QUESTION_SEQUENCE = 'questions';

const QUESTION_FIELDS = { _id: 0, id: 1, question: 1, answer: 1, category: 1, difficulty: 1 };
const CATEGORY_FIELDS = { _id: 0, id: 1, type: 1 };

export const escapeRegex = (term: string): string => term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const toQuestionRecord = (q: QuestionRecord): QuestionRecord => ({
  id: q.id,
  question: q.question,
  answer: q.answer,
  category: q.category,
  difficulty: q.difficulty,
});

export class MongoTriviaRepository implements TriviaRepository {
  async listQuestions(offset: number, limit: number): Promise<QuestionPage> {
    try {
      const [questions, total] = await Promise.all([
        Question.find({}, QUESTION_FIELDS).sort({ id: 1 }).skip(offset).limit(limit).lean<QuestionRecord[]>(),
        Question.countDocuments(),
      ]);
      return { questions: questions.map(toQuestionRecord), total };
    } catch (error) {
      throw new ApiError(500, 'Failed to fetch questions');
    }
  }

  async findQuestionById(id: number): Promise<QuestionRecord | null> {
    try {
      const question = await Question.findOne({ id }, QUESTION_FIELDS).lean<QuestionRecord>();
      return question ? toQuestionRecord(question) : null;
    } catch (error) {
      throw new ApiError(500, 'Failed to fetch question');
    }
  }

  async insertQuestion(data: NewQuestion): Promise<QuestionRecord> {
    try {
      const category = await Category.exists({ id: data.category });
      if (!category) {
        throw new StoreRejectedError(`Category ${data.category} does not exist`);
      }

      const id = await nextSequence(QUESTION_SEQUENCE);
      await Question.insertOne({ ...data, id });
      return toQuestionRecord({ ...data, id });
    } catch (error) {
      if (error instanceof ApiError) throw error;
      console.error('[TriviaRepository] Insert rejected:', error);
      throw new StoreRejectedError('Failed to create question');
    }
  }

  async deleteQuestion(id: number): Promise<boolean> {
    try {
      const result = await Question.deleteOne({ id });
      return result.deletedCount > 0;
    } catch (error) {
      console.error('[TriviaRepository] Delete rejected:', error);
      throw new StoreRejectedError('Failed to delete question');
    }
  }

  async searchQuestions(term: string): Promise<QuestionRecord[]> {
    try {
      const questions = await Question.find(
        { question: { $regex: escapeRegex(term), $options: 'i' } },
        QUESTION_FIELDS
      )
        .sort({ id: 1 })
        .lean<QuestionRecord[]>();
      return questions.map(toQuestionRecord);
    } catch (error) {
      throw new ApiError(500, 'Failed to search questions');
    }
  }

  async listCategories(): Promise<CategoryRecord[]> {
    try {
      const categories = await Category.find({}, CATEGORY_FIELDS).sort({ id: 1 }).lean<CategoryRecord[]>();
      return categories.map(({ id, type }) => ({ id, type }));
    } catch (error) {
      throw new ApiError(500, 'Failed to fetch categories');
    }
  }

  async findCategoryById(id: number): Promise<CategoryRecord | null> {
    try {
      const category = await Category.findOne({ id }, CATEGORY_FIELDS).lean<CategoryRecord>();
      return category ? { id: category.id, type: category.type } : null;
    } catch (error) {
      throw new ApiError(500, 'Failed to fetch category');
    }
  }

  async listQuestionsByCategory(categoryId: number): Promise<QuestionRecord[]> {
    try {
      const questions = await Question.find({ category: categoryId }, QUESTION_FIELDS)
        .sort({ id: 1 })
        .lean<QuestionRecord[]>();
      return questions.map(toQuestionRecord);
    } catch (error) {
      throw new ApiError(500, 'Failed to fetch questions for category');
    }
  }

  async pickRandomQuestion(categoryId: number | undefined, excludeIds: number[]): Promise<QuestionRecord | null> {
    try {
      const query: FilterQuery<IQuestion> = { id: { $nin: excludeIds } };
      if (categoryId !== undefined) query.category = categoryId;

      // $sample draws from the matched set in the same round-trip as the filter.
      const [question] = await Question.aggregate<QuestionRecord>([
        { $match: query },
        { $sample: { size: 1 } },
        { $project: QUESTION_FIELDS },
      ]);

      return question ? toQuestionRecord(question) : null;
    } catch (error) {
      throw new ApiError(500, 'Failed to pick quiz question');
    }
  }
}
