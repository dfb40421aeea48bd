import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MAX_DIFFICULTY, MIN_DIFFICULTY } from '../models/types';

export const DEFAULT_FIXTURE_PATH = path.resolve(__dirname, '../../data/trivia.json');

const fixtureSchema = z
  .object({
    categories: z.array(z.object({ id: z.number().int().positive(), type: z.string().min(1) })),
    questions: z.array(
      z.object({
        id: z.number().int().positive(),
        question: z.string().min(1),
        answer: z.string().min(1),
        category: z.number().int().positive(),
        difficulty: z.number().int().min(MIN_DIFFICULTY).max(MAX_DIFFICULTY),
      })
    ),
  })
  .superRefine((fixture, ctx) => {
    const categoryIds = new Set(fixture.categories.map((c) => c.id));
    fixture.questions.forEach((q, index) => {
      if (!categoryIds.has(q.category)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['questions', index, 'category'],
          message: `Unknown category ${q.category}`,
        });
      }
    });
  });

export type TriviaFixture = z.infer<typeof fixtureSchema>;

export const loadFixture = (fixturePath: string = DEFAULT_FIXTURE_PATH): TriviaFixture => {
  const raw: unknown = JSON.parse(fs.readFileSync(fixturePath, 'utf8'));
  return fixtureSchema.parse(raw);
};
