import { NoClimatologicalBasisError, SumInvariantViolation } from '@/core/errors';
import { CandidateSource } from '@/core/weight-table';
import { FutureBlock, HourlyResult, MatchLevel } from '@/types/precipitation.types';
import { BlockFailure, MatchStats } from '@/types/run.types';
import { BLOCK_HOURS, addHours } from '@/utils/time-window.utils';
import {
  IndexedBlock,
  RandomSourceFactory,
  createSeededRandom,
  deriveBlockSeed,
  pickIndex,
} from '@/utils/seed.utils';
import { Resolution, ResolverOptions, resolvePeriod } from '@/services/period-resolver.service';

export interface DisaggregationOptions extends ResolverOptions {
  baseSeed: number;
  sumTolerance: number;
  randomFactory?: RandomSourceFactory;
}

export interface BlockOutcome {
  results: HourlyResult[];
  resolution: Resolution;
  source_year: number;
  seed: number;
  // |total - sum of the hourly values|
  deviation: number;
}

export interface PartitionOutcome {
  results: HourlyResult[];
  processed_blocks: number;
  match_stats: MatchStats;
  no_climatological_basis: BlockFailure[];
  sum_invariant_violations: BlockFailure[];
  aborted_blocks: BlockFailure[];
  max_sum_deviation: number;
}

export const emptyMatchStats = (): MatchStats => ({ FINE: 0, FALLBACK: 0, COARSE: 0 });

/**
 * Relative check: |sum - total| <= tolerance * max(1, |total|).
 */
export const isSumPreserved = (total: number, values: readonly number[], tolerance: number): boolean => {
  const sum = values.reduce((acc, v) => acc + v, 0);
  return Math.abs(sum - total) <= tolerance * Math.max(1, Math.abs(total));
};

/**
 * Split one block's total with a triple drawn from an already resolved key.
 *
 * Randomness only decides which year's triple is used; the split itself is a
 * plain multiplication, so the sum holds whatever year is drawn. A result
 * that does not add back up to the total raises SumInvariantViolation and
 * nothing is emitted for the block.
 */
export function splitBlock(
  block: FutureBlock,
  recordIndex: number,
  resolution: Resolution,
  options: DisaggregationOptions
): BlockOutcome {
  const seed = deriveBlockSeed(options.baseSeed, recordIndex);
  const random = (options.randomFactory ?? createSeededRandom)(seed);
  const chosen = resolution.candidates[pickIndex(random, resolution.candidates.length)];

  const values = chosen.weights.map(weight => block.total_mm * weight);
  const sum = values.reduce((acc, v) => acc + v, 0);

  if (!isSumPreserved(block.total_mm, values, options.sumTolerance)) {
    throw new SumInvariantViolation(block.cell_id, block.block_start, resolution.key_id, block.total_mm, sum);
  }

  const results: HourlyResult[] = [];
  for (let offset = 0; offset < BLOCK_HOURS; offset++) {
    results.push({
      cell_id: block.cell_id,
      hour_timestamp: addHours(block.block_start, offset),
      value_mm: values[offset],
      block_start: block.block_start,
      block_total_mm: block.total_mm,
      hour_in_block: offset,
      weight: chosen.weights[offset],
      source_year: chosen.source_year,
      match_level: resolution.match_level,
      weight_key: resolution.key_id,
      record_index: recordIndex,
      seed,
    });
  }

  return { results, resolution, source_year: chosen.source_year, seed, deviation: Math.abs(sum - block.total_mm) };
}

/**
 * Disaggregate one 3-hour block: resolve its weight key, then split.
 */
export function disaggregateBlock(
  block: FutureBlock,
  recordIndex: number,
  source: CandidateSource,
  options: DisaggregationOptions
): BlockOutcome {
  return splitBlock(block, recordIndex, resolvePeriod(source, block.cell_id, block.block_start, options), options);
}

const failureOf = (block: FutureBlock, error: string, weightKey?: string): BlockFailure => ({
  cell_id: block.cell_id,
  timestamp: block.block_start,
  weight_key: weightKey,
  error,
});

/**
 * Process one partition of already indexed blocks. A partition must contain
 * every block of the cells it covers, since a sum violation discards all
 * results of its (cell, key) combination and skips the rest of them.
 */
export function disaggregatePartition(
  blocks: readonly IndexedBlock[],
  source: CandidateSource,
  options: DisaggregationOptions
): PartitionOutcome {
  const outcome: PartitionOutcome = {
    results: [],
    processed_blocks: 0,
    match_stats: emptyMatchStats(),
    no_climatological_basis: [],
    sum_invariant_violations: [],
    aborted_blocks: [],
    max_sum_deviation: 0,
  };

  const byCombo = new Map<string, { results: HourlyResult[]; levels: MatchLevel[]; max_deviation: number }>();
  const aborted = new Set<string>();

  for (const { block, record_index } of blocks) {
    let resolution: Resolution;
    try {
      resolution = resolvePeriod(source, block.cell_id, block.block_start, options);
    } catch (error) {
      if (!(error instanceof NoClimatologicalBasisError)) {
        throw error;
      }
      outcome.no_climatological_basis.push(failureOf(block, error.message));
      continue;
    }

    const combo = `${block.cell_id}|${resolution.key_id}`;
    if (aborted.has(combo)) {
      outcome.aborted_blocks.push(failureOf(block, 'skipped after a sum invariant violation on the same weight key', resolution.key_id));
      continue;
    }

    try {
      const { results, deviation } = splitBlock(block, record_index, resolution, options);
      const entry = byCombo.get(combo) ?? { results: [], levels: [], max_deviation: 0 };
      entry.results.push(...results);
      entry.levels.push(resolution.match_level);
      entry.max_deviation = Math.max(entry.max_deviation, deviation);
      byCombo.set(combo, entry);

    } catch (error) {
      if (!(error instanceof SumInvariantViolation)) {
        throw error;
      }
      outcome.sum_invariant_violations.push(failureOf(block, error.message, error.weight_key));

      // Results already produced from this key cannot be trusted either
      for (const result of byCombo.get(combo)?.results ?? []) {
        if (result.hour_in_block === 0) {
          outcome.aborted_blocks.push({
            cell_id: result.cell_id,
            timestamp: result.block_start,
            weight_key: error.weight_key,
            error: 'discarded after a sum invariant violation on the same weight key',
          });
        }
      }
      byCombo.delete(combo);
      aborted.add(combo);
    }
  }

  for (const { results, levels, max_deviation } of byCombo.values()) {
    outcome.results.push(...results);
    outcome.max_sum_deviation = Math.max(outcome.max_sum_deviation, max_deviation);
    for (const level of levels) {
      outcome.match_stats[level]++;
      outcome.processed_blocks++;
    }
  }
  outcome.results.sort((a, b) => a.record_index - b.record_index || a.hour_in_block - b.hour_in_block);

  return outcome;
}
