import mongoose, { Schema, Document } from 'mongoose';

export interface ICategory extends Document {
  id: number;
  type: string;
}

const CategorySchema: Schema = new Schema(
  {
    id: {
      type: Number,
      required: true,
      unique: true,
      index: true,
    },
    type: {
      type: String,
      required: true,
      trim: true,
    },
  },
  {
    collection: 'categories',
    id: false,
  }
);

export default mongoose.model<ICategory>('Category', CategorySchema);
