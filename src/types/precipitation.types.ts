export type Variable = 'precipitation' | 'temperature' | 'radiation';

// Series stored side by side in the time-series collection
export type SeriesKind = 'observed' | 'projected_3h' | 'disaggregated_1h';

export interface Observation {
  readonly timestamp: Date;
  readonly cell_id: number;
  readonly variable: Variable;
  readonly value: number;
}

export type HourlyTotalStatus = 'OBSERVED' | 'ZERO_FILLED' | 'NO_DATA';

export interface HourlyTotal {
  cell_id: number;
  hour: Date;
  value_mm: number | null;        // null when status is NO_DATA
  status: HourlyTotalStatus;
  observation_count: number;
  fill_policy: 'exclude' | 'zero-fill';
}

export interface WeightKey {
  cell_id: number;
  month: number;                  // 1-12, UTC
  hour_bucket: number | null;     // 0,3,...,21; null at month-only granularity
}

export interface FutureBlock {
  readonly cell_id: number;
  readonly block_start: Date;
  readonly total_mm: number;
}

export type MatchLevel = 'FINE' | 'FALLBACK' | 'COARSE';

export interface HourlyResult {
  cell_id: number;
  hour_timestamp: Date;
  value_mm: number;
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

export interface BlockWindow {
  start: Date;
  end: Date;
  hour_bucket: number;            // 0,3,...,21
  block_index: number;            // 0-7 within the day
}

export interface HourWindow {
  start: Date;
  end: Date;
  hour_index: number;             // 0-23
}
