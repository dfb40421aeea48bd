/**
 * Test Helper Functions
 * In-memory repository and a throwaway HTTP server around the real app
 */

import { once } from 'events';
import { z } from 'zod';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { StoreRejectedError } from '../middlewares/errorHandler';
import { CategoryRecord, NewQuestion, QuestionPage, QuestionRecord } from '../models/types';
import { TriviaRepository } from '../repositories/types';

export const SAMPLE_CATEGORIES: CategoryRecord[] = [
  { id: 1, type: 'Science' },
  { id: 2, type: 'Art' },
  { id: 3, type: 'Geography' },
  { id: 4, type: 'History' },
];

const SPECIAL_TEXTS: Record<number, string> = {
  3: 'Which ocean lies south of the Indian subcontinent?',
  8: 'Name a classical indian dance form',
  21: 'What is the INDIAN name for the banyan tree?',
};

/**
 * 25 questions: ids 20-23 are Science (1), other even ids Art (2), other odd
 * ids Geography (3). History (4) has none.
 */
export const sampleQuestions = (): QuestionRecord[] =>
  Array.from({ length: 25 }, (_, index) => {
    const id = index + 1;
    return {
      id,
      question: SPECIAL_TEXTS[id] ?? `Sample question ${id}?`,
      answer: `Answer ${id}`,
      category: id >= 20 && id <= 23 ? 1 : id % 2 === 0 ? 2 : 3,
      difficulty: (id % 5) + 1,
    };
  });

export class InMemoryTriviaRepository implements TriviaRepository {
  private questions: QuestionRecord[];
  private categories: CategoryRecord[];
  private lastId: number;

  constructor(
    questions: QuestionRecord[] = sampleQuestions(),
    categories: CategoryRecord[] = SAMPLE_CATEGORIES,
    private readonly random: () => number = Math.random
  ) {
    this.questions = [...questions].sort((a, b) => a.id - b.id);
    this.categories = [...categories].sort((a, b) => a.id - b.id);
    this.lastId = this.questions.reduce((max, q) => Math.max(max, q.id), 0);
  }

  async listQuestions(offset: number, limit: number): Promise<QuestionPage> {
    return { questions: this.questions.slice(offset, offset + limit), total: this.questions.length };
  }

  async countQuestions(): Promise<number> {
    return this.questions.length;
  }

  async findQuestionById(id: number): Promise<QuestionRecord | null> {
    return this.questions.find((q) => q.id === id) ?? null;
  }

  async insertQuestion(data: NewQuestion): Promise<QuestionRecord> {
    if (!this.categories.some((c) => c.id === data.category)) {
      throw new StoreRejectedError(`Category ${data.category} does not exist`);
    }
    this.lastId += 1;
    const question = { ...data, id: this.lastId };
    this.questions.push(question);
    return question;
  }

  async deleteQuestion(id: number): Promise<boolean> {
    const before = this.questions.length;
    this.questions = this.questions.filter((q) => q.id !== id);
    return this.questions.length < before;
  }

  async searchQuestions(term: string): Promise<QuestionRecord[]> {
    const needle = term.toLowerCase();
    return this.questions.filter((q) => q.question.toLowerCase().includes(needle));
  }

  async listCategories(): Promise<CategoryRecord[]> {
    return [...this.categories];
  }

  async findCategoryById(id: number): Promise<CategoryRecord | null> {
    return this.categories.find((c) => c.id === id) ?? null;
  }

  async listQuestionsByCategory(categoryId: number): Promise<QuestionRecord[]> {
    return this.questions.filter((q) => q.category === categoryId);
  }

  async pickRandomQuestion(categoryId: number | undefined, excludeIds: number[]): Promise<QuestionRecord | null> {
    const excluded = new Set(excludeIds);
    const candidates = this.questions.filter(
      (q) => !excluded.has(q.id) && (categoryId === undefined || q.category === categoryId)
    );
    if (candidates.length === 0) return null;
    return candidates[Math.floor(this.random() * candidates.length)] ?? null;
  }
}

export const testConfig = loadConfig({ NODE_ENV: 'test' });

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/**
 * Start the app on an ephemeral port
 * @param repository - Repository the controllers will use
 */
export async function startTestServer(repository: TriviaRepository): Promise<TestServer> {
  const app = createApp(testConfig, repository);
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export interface JsonResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

export async function requestJson(
  baseUrl: string,
  path: string,
  init: { method?: string; body?: unknown; rawBody?: string; headers?: Record<string, string> } = {}
): Promise<JsonResponse> {
  const hasBody = init.body !== undefined || init.rawBody !== undefined;
  const response = await fetch(`${baseUrl}${path}`, {
    method: init.method ?? 'GET',
    headers: {
      ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
      ...init.headers,
    },
    body: init.rawBody ?? (init.body !== undefined ? JSON.stringify(init.body) : undefined),
  });
  const text = await response.text();
  return {
    status: response.status,
    headers: response.headers,
    body: text.length > 0 ? JSON.parse(text) : null,
  };
}

// Response shapes, parsed so tests can reach into bodies with types.
export const questionSchema = z.object({
  id: z.number(),
  question: z.string(),
  answer: z.string(),
  category: z.number(),
  difficulty: z.number(),
});

export const questionListBodySchema = z.object({
  success: z.literal(true),
  questions: z.array(questionSchema),
  total_questions: z.number(),
});

export const quizBodySchema = z.object({
  success: z.literal(true),
  question: questionSchema.nullable(),
});

export const errorBodySchema = z.object({
  success: z.literal(false),
  error: z.number(),
  message: z.string(),
});
