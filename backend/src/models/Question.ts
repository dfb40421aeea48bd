import mongoose, { Schema, Document } from 'mongoose';
import { MAX_DIFFICULTY, MIN_DIFFICULTY } from './types';

export interface IQuestion extends Document {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
}

const QuestionSchema: Schema = new Schema(
  {
    id: {
      type: Number,
      required: true,
      unique: true,
      index: true,
    },
    question: {
      type: String,
      required: true,
    },
    answer: {
      type: String,
      required: true,
    },
    category: {
      type: Number,
      required: true,
      index: true,
    },
    difficulty: {
      type: Number,
      required: true,
      min: MIN_DIFFICULTY,
      max: MAX_DIFFICULTY,
    },
  },
  {
    collection: 'questions',
    id: false,
  }
);

export default mongoose.model<IQuestion>('Question', QuestionSchema);
