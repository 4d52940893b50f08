import { HourlyResult, HourlyTotal, MatchLevel } from '@/types/precipitation.types';

export interface BlockFailure {
  cell_id: number;
  timestamp: Date;
  weight_key?: string;
  error: string;
}

export interface AggregationResult {
  cell_id: number;
  totals: HourlyTotal[];
  fill_policy: 'exclude' | 'zero-fill';
  observed_hours: number;
  zero_filled_hours: number;
  no_data_hours: number;
  duplicate_observations: number;
  invalid_observations: number;
  ignored_observations: number;
  gaps: BlockFailure[];
}

export interface MalformedTripleReport {
  weight_key: string;
  source_year: number;
  error: string;
}

export interface WeightBuildResult {
  cell_id: number;
  blocks_seen: number;
  valid_blocks: number;
  gap_blocks: number;
  zero_blocks: number;
  keys: number;
  triples: number;
  malformed_triples: MalformedTripleReport[];
}

export type MatchStats = Record<MatchLevel, number>;

// A partition whose hourly results could not be written
export interface WriteFailure {
  cell_ids: number[];
  results: number;
  error: string;
}

// Per failure kind: count is the array length, identity is (cell_id, timestamp)
export interface DisaggregationRunReport {
  base_seed: number;
  total_blocks: number;
  processed_blocks: number;
  results_written: number;
  match_stats: MatchStats;
  invalid_blocks: BlockFailure[];
  no_climatological_basis: BlockFailure[];
  sum_invariant_violations: BlockFailure[];
  aborted_blocks: BlockFailure[];
  write_failures: WriteFailure[];
  // Largest |3-hour total - sum of its hourly values| over written blocks
  max_sum_deviation: number;
  processing_time_ms: number;
  // Only when the run was asked to keep them
  results?: HourlyResult[];
}
