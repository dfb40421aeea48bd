export interface CategoryRecord {
  id: number;
  type: string;
}

export interface QuestionRecord {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
}

export type NewQuestion = Omit<QuestionRecord, 'id'>;

export interface QuestionPage {
  questions: QuestionRecord[];
  total: number;
}

/** Shape the API returns for category lists: `{ [id]: type }`. */
export type CategoryMap = Record<string, string>;

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 5;
