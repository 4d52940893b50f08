import Config from '@/config/index';
import { getErrorMessage } from '@/core/errors';
import { WeightTable } from '@/core/weight-table';
import { findFutureBlocks, upsertHourlyResults } from '@/database/timeseries.repository';
import { loadWeightTable } from '@/database/weight-table.repository';
import {
  DisaggregationOptions,
  PartitionOutcome,
  disaggregatePartition,
  emptyMatchStats,
} from '@/services/disaggregation.service';
import { DisaggregationRunReport } from '@/types/run.types';
import { HourlyResult } from '@/types/precipitation.types';
import { IndexedBlock, RandomSourceFactory, assignRecordIndices } from '@/utils/seed.utils';
import { logger } from '@/utils/logger';

export interface DisaggregationRunOptions {
  from?: Date;
  to?: Date;
  cellId?: number;
  baseSeed?: number;
  workerCount?: number;
  // Use this table instead of the stored one (e.g. an imported CSV)
  weightTable?: WeightTable;
  randomFactory?: RandomSourceFactory;
  // Return the written hourly results on the report (for a CSV export)
  keepResults?: boolean;
}

/**
 * Split indexed blocks into `workerCount` partitions by cell. Cells are dealt
 * round-robin in ascending order, so every block of a cell lands in the same
 * partition. Empty partitions are dropped.
 */
export function partitionByCell(blocks: readonly IndexedBlock[], workerCount: number): IndexedBlock[][] {
  const count = Math.max(1, Math.floor(workerCount));
  const byCell = new Map<number, IndexedBlock[]>();
  for (const indexed of blocks) {
    const list = byCell.get(indexed.block.cell_id) ?? [];
    list.push(indexed);
    byCell.set(indexed.block.cell_id, list);
  }

  const partitions: IndexedBlock[][] = Array.from({ length: count }, () => []);
  [...byCell.keys()]
    .sort((a, b) => a - b)
    .forEach((cellId, i) => {
      partitions[i % count].push(...(byCell.get(cellId) ?? []));
    });

  return partitions.filter(partition => partition.length > 0);
}

/**
 * Disaggregate every projected 3-hour block in the window and write the
 * hourly results.
 *
 * Record indices are assigned over the whole run before partitioning, so the
 * output does not depend on `workerCount`. Partitions compute and write
 * independently; a partition whose write fails is reported under
 * `write_failures` and the others still count.
 */
export async function runDisaggregation(options: DisaggregationRunOptions = {}): Promise<DisaggregationRunReport> {
  const startTime = Date.now();
  const settings = Config.DISAGGREGATION;
  const from = options.from ?? settings.HORIZON_START;
  const to = options.to ?? settings.HORIZON_END;
  const baseSeed = options.baseSeed ?? settings.BASE_SEED;

  const report: DisaggregationRunReport = {
    base_seed: baseSeed,
    total_blocks: 0,
    processed_blocks: 0,
    results_written: 0,
    match_stats: emptyMatchStats(),
    invalid_blocks: [],
    no_climatological_basis: [],
    sum_invariant_violations: [],
    aborted_blocks: [],
    write_failures: [],
    max_sum_deviation: 0,
    processing_time_ms: 0,
  };

  try {
    logger.info('Starting disaggregation run', {
      from: from.toISOString(),
      to: to.toISOString(),
      cell_id: options.cellId,
      base_seed: baseSeed,
      seed_source: options.baseSeed === undefined ? settings.BASE_SEED_SOURCE : 'explicit',
      granularity: settings.GRANULARITY,
    });

    const { blocks, invalid } = await findFutureBlocks({ from, to, cell_id: options.cellId });
    report.total_blocks = blocks.length + invalid.length;
    report.invalid_blocks.push(...invalid);
    for (const failure of invalid) {
      logger.warn(`Skipping invalid block for cell ${failure.cell_id}`, { timestamp: failure.timestamp, error: failure.error });
    }

    let table = options.weightTable;
    if (!table) {
      const cellIds = [...new Set(blocks.map(block => block.cell_id))];
      const stored = await loadWeightTable(cellIds, settings.GRANULARITY);
      for (const bad of stored.malformed) {
        logger.warn(`Excluded stored triple ${bad.weight_key} (${bad.source_year})`, { error: bad.error });
      }
      for (const stale of stored.granularity_mismatches) {
        logger.warn(`Weights for cell ${stale.cell_id} were built at ${stale.granularity}, run uses ${settings.GRANULARITY}`);
      }
      table = stored.table;
    }

    const disaggregationOptions: DisaggregationOptions = {
      granularity: settings.GRANULARITY,
      fallbackEnabled: settings.FALLBACK_ENABLED,
      minFineCandidates: settings.MIN_FINE_CANDIDATES,
      baseSeed,
      sumTolerance: settings.SUM_TOLERANCE,
      randomFactory: options.randomFactory,
    };

    const source = table;
    const partitions = partitionByCell(assignRecordIndices(blocks), options.workerCount ?? settings.WORKER_COUNT);

    logger.debug(`Dispatching ${blocks.length} blocks over ${partitions.length} partitions`, {
      partition_sizes: partitions.map(p => p.length),
      weight_keys: source.size,
    });

    const outcomes: PartitionOutcome[] = partitions.map(partition =>
      disaggregatePartition(partition, source, disaggregationOptions)
    );
    const writes = await Promise.allSettled(
      outcomes.map(outcome => upsertHourlyResults(outcome.results, settings.WRITE_BATCH_SIZE))
    );
    const kept: HourlyResult[] = [];

    outcomes.forEach((outcome, i) => {
      const write = writes[i];
      if (write.status === 'rejected') {
        report.write_failures.push({
          cell_ids: [...new Set(partitions[i].map(indexed => indexed.block.cell_id))],
          results: outcome.results.length,
          error: getErrorMessage(write.reason),
        });
      } else {
        report.processed_blocks += outcome.processed_blocks;
        report.results_written += write.value.upserted + write.value.matched;
        report.max_sum_deviation = Math.max(report.max_sum_deviation, outcome.max_sum_deviation);
        report.match_stats.FINE += outcome.match_stats.FINE;
        report.match_stats.FALLBACK += outcome.match_stats.FALLBACK;
        report.match_stats.COARSE += outcome.match_stats.COARSE;
        if (options.keepResults) {
          kept.push(...outcome.results);
        }
      }

      report.no_climatological_basis.push(...outcome.no_climatological_basis);
      report.sum_invariant_violations.push(...outcome.sum_invariant_violations);
      report.aborted_blocks.push(...outcome.aborted_blocks);
    });

    if (options.keepResults) {
      report.results = kept.sort((a, b) => a.record_index - b.record_index || a.hour_in_block - b.hour_in_block);
    }

    for (const failure of report.no_climatological_basis) {
      logger.warn(failure.error, { cell_id: failure.cell_id, timestamp: failure.timestamp });
    }
    for (const failure of report.sum_invariant_violations) {
      logger.error(failure.error, { cell_id: failure.cell_id, weight_key: failure.weight_key });
    }
    for (const failure of report.write_failures) {
      logger.error(`Failed to write ${failure.results} hourly values`, { cell_ids: failure.cell_ids, error: failure.error });
    }

    report.processing_time_ms = Date.now() - startTime;

    logger.notify(
      `Disaggregation run finished: ${report.processed_blocks}/${report.total_blocks} blocks, ${report.results_written} hourly values written`,
      {
        base_seed: report.base_seed,
        match_stats: report.match_stats,
        invalid_blocks: report.invalid_blocks.length,
        no_climatological_basis: report.no_climatological_basis.length,
        sum_invariant_violations: report.sum_invariant_violations.length,
        aborted_blocks: report.aborted_blocks.length,
        write_failures: report.write_failures.length,
        max_sum_deviation: report.max_sum_deviation,
        processing_time_ms: report.processing_time_ms,
      }
    );

    return report;

  } catch (error) {
    logger.error('Disaggregation run failed:', { error: getErrorMessage(error) });
    throw error;
  }
}
