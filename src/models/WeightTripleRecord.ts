import { Schema, model } from 'mongoose';

export interface IWeightTripleRecord {
  cell_id: number;
  month: number;
  hour_bucket: number | null;
  source_year: number;
  weights: number[];
  block_count: number;
  total_mm: number;
  built_at: Date;
}

const weightTripleSchema = new Schema<IWeightTripleRecord>({
  cell_id: {
    type: Number,
    required: true
  },
  month: {
    type: Number,
    required: true,
    min: 1,
    max: 12
  },
  hour_bucket: {
    type: Number,
    default: null,
    min: 0,
    max: 21
  },
  source_year: {
    type: Number,
    required: true
  },
  weights: {
    type: [Number],
    required: true
  },
  block_count: {
    type: Number,
    default: 0
  },
  total_mm: {
    type: Number,
    default: 0
  },
  // Generation the triple belongs to; see WeightGeneration
  built_at: {
    type: Date,
    required: true
  }
}, {
  collection: 'weight_triples'
});

weightTripleSchema.index({ cell_id: 1, built_at: 1, month: 1, hour_bucket: 1, source_year: 1 }, { unique: true });

const WeightTripleRecord = model<IWeightTripleRecord>('WeightTripleRecord', weightTripleSchema);

export default WeightTripleRecord;
