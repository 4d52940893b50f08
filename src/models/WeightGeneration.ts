import { Schema, model } from 'mongoose';
import { WeightGranularity } from '@/config/index';

// Points each cell at the weight triples currently in use
export interface IWeightGeneration {
  cell_id: number;
  built_at: Date;
  granularity: WeightGranularity;
  triples: number;
}

const weightGenerationSchema = new Schema<IWeightGeneration>({
  cell_id: {
    type: Number,
    required: true,
    unique: true
  },
  built_at: {
    type: Date,
    required: true
  },
  granularity: {
    type: String,
    enum: ['month-hour', 'month-only'],
    required: true
  },
  triples: {
    type: Number,
    default: 0
  }
}, {
  collection: 'weight_generations'
});

const WeightGeneration = model<IWeightGeneration>('WeightGeneration', weightGenerationSchema);

export default WeightGeneration;
