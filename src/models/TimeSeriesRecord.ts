import { Schema, model } from 'mongoose';
import { MatchLevel, SeriesKind, Variable } from '@/types/precipitation.types';

export interface IDisaggregationMeta {
  block_start: Date;
  block_total_mm: number;
  hour_in_block: number;
  weight: number;
  source_year: number;
  match_level: MatchLevel;
  weight_key: string;
  record_index: number;
  seed: number;
}

export interface ITimeSeriesRecord {
  timestamp: Date;
  cell_id: number;
  variable: Variable;
  series: SeriesKind;
  value: number;
  meta?: IDisaggregationMeta;
}

const disaggregationMetaSchema = new Schema<IDisaggregationMeta>({
  block_start: { type: Date, required: true },
  block_total_mm: { type: Number, required: true, min: 0 },
  hour_in_block: { type: Number, required: true, min: 0, max: 2 },
  weight: { type: Number, required: true, min: 0, max: 1 },
  source_year: { type: Number, required: true },
  match_level: { type: String, enum: ['FINE', 'FALLBACK', 'COARSE'], required: true },
  weight_key: { type: String, required: true },
  record_index: { type: Number, required: true },
  seed: { type: Number, required: true }
}, { _id: false });

const timeSeriesRecordSchema = new Schema<ITimeSeriesRecord>({
  timestamp: {
    type: Date,
    required: true
  },
  cell_id: {
    type: Number,
    required: true,
    index: true
  },
  variable: {
    type: String,
    enum: ['precipitation', 'temperature', 'radiation'],
    required: true
  },
  series: {
    type: String,
    enum: ['observed', 'projected_3h', 'disaggregated_1h'],
    required: true
  },
  value: {
    type: Number,
    required: true
  },
  meta: {
    type: disaggregationMetaSchema
  }
}, {
  collection: 'timeseries'
});

// One value per (time, cell, variable, series); also the range-query index
timeSeriesRecordSchema.index({ cell_id: 1, variable: 1, series: 1, timestamp: 1 }, { unique: true });

const TimeSeriesRecord = model<ITimeSeriesRecord>('TimeSeriesRecord', timeSeriesRecordSchema);

export default TimeSeriesRecord;
