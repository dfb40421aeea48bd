import { CategoryRecord, NewQuestion, QuestionPage, QuestionRecord } from '../models/types';

/**
 * Storage seam for the trivia API. Controllers only ever talk to this
 * interface; the mongoose implementation lives in `triviaRepository.ts`.
 *
 * Reads reject with a 500 `ApiError` when the store fails. Writes reject
 * with a `StoreRejectedError` (422) when the store refuses them.
 */
export interface TriviaRepository {
  /** Questions ordered by id, sliced by offset/limit, plus the full row count. */
  listQuestions(offset: number, limit: number): Promise<QuestionPage>;
  findQuestionById(id: number): Promise<QuestionRecord | null>;
  /** Inserts with a fresh id. Rejects when `category` does not exist. */
  insertQuestion(question: NewQuestion): Promise<QuestionRecord>;
  /** Resolves false when no row had that id. */
  deleteQuestion(id: number): Promise<boolean>;
  /** Case-insensitive literal substring match on the question text. */
  searchQuestions(term: string): Promise<QuestionRecord[]>;
  listCategories(): Promise<CategoryRecord[]>;
  findCategoryById(id: number): Promise<CategoryRecord | null>;
  listQuestionsByCategory(categoryId: number): Promise<QuestionRecord[]>;
  /**
   * Uniformly random question not in `excludeIds`, restricted to
   * `categoryId` when one is given. Null once every candidate is excluded.
   */
  pickRandomQuestion(categoryId: number | undefined, excludeIds: number[]): Promise<QuestionRecord | null>;
}
