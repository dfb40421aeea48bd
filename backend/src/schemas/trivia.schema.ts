import { z } from 'zod';
import { MAX_DIFFICULTY, MIN_DIFFICULTY } from '../models/types';

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

// A JSON number or a string of digits; booleans, arrays and null are rejected.
const wholeNumber = (target: z.ZodNumber) =>
  z
    .union([z.number(), z.string().regex(/^\d+$/, 'Expected a whole number').transform(Number)])
    .pipe(target.int());

export const pageQuerySchema = z.object({
  page: wholeNumber(z.number().min(1)).default(1),
});

export const createQuestionSchema = z.object({
  question: requiredText('question'),
  answer: requiredText('answer'),
  category: wholeNumber(z.number().positive()),
  difficulty: wholeNumber(z.number().min(MIN_DIFFICULTY).max(MAX_DIFFICULTY)),
});

export const searchQuestionsSchema = z.object({
  search_term: z.string().default(''),
});

export const playQuizSchema = z.object({
  quiz_category: z.object({
    // 0 selects every category
    id: wholeNumber(z.number().min(0)),
    type: z.string().optional(),
  }),
  previous_questions: z.array(wholeNumber(z.number())),
});

export type PageQuery = z.infer<typeof pageQuerySchema>;
export type CreateQuestionBody = z.infer<typeof createQuestionSchema>;
export type SearchQuestionsBody = z.infer<typeof searchQuestionsSchema>;
export type PlayQuizBody = z.infer<typeof playQuizSchema>;
