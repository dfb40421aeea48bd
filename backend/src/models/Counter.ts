import mongoose, { Schema } from 'mongoose';

// One document per auto-increment sequence, keyed by collection name.
export interface ICounter {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { collection: 'counters', versionKey: false }
);

const Counter = mongoose.model<ICounter>('Counter', CounterSchema);

export const nextSequence = async (name: string): Promise<number> => {
  const counter = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true }
  );
  if (!counter) {
    throw new Error(`Sequence ${name} could not be advanced`);
  }
  return counter.seq;
};

export const setSequence = async (name: string, seq: number): Promise<void> => {
  await Counter.updateOne({ _id: name }, { $set: { seq } }, { upsert: true });
};

export default Counter;
