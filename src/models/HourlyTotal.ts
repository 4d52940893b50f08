import { Schema, model } from 'mongoose';
import { HourlyTotal as IHourlyTotal } from '@/types/precipitation.types';

const hourlyTotalSchema = new Schema<IHourlyTotal>({
  cell_id: {
    type: Number,
    required: true
  },
  hour: {
    type: Date,
    required: true
  },
  value_mm: {
    type: Number,
    default: null
  },
  status: {
    type: String,
    enum: ['OBSERVED', 'ZERO_FILLED', 'NO_DATA'],
    required: true
  },
  observation_count: {
    type: Number,
    default: 0
  },
  fill_policy: {
    type: String,
    enum: ['exclude', 'zero-fill'],
    required: true
  }
}, {
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  collection: 'hourly_totals'
});

hourlyTotalSchema.index({ cell_id: 1, hour: 1 }, { unique: true });

const HourlyTotal = model<IHourlyTotal>('HourlyTotal', hourlyTotalSchema);

export default HourlyTotal;
