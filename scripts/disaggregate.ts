#!/usr/bin/env ts-node
/**
 * CLI script to disaggregate projected 3-hour precipitation into hourly values
 *
 * Usage:
 *   npm run disaggregate
 *   npm run disaggregate -- --cell-id 7 --seed 42 --from 2030-01-01 --to 2031-01-01
 *   npm run disaggregate -- --cell-id 7 --weights-file weights/cell-7.csv
 *   npm run disaggregate -- --cell-id 7 --export results/cell_7/pr_stochastic_disaggregated.csv
 */

import path from 'path';
import Config from '@/config/index';
import { connectDB, disconnectDB } from '@/database/connection';
import { runDisaggregation, DisaggregationRunOptions } from '@/services/disaggregation-run.service';
import { importWeightTableCSV } from '@/services/weight-table-csv.service';
import { exportHourlyResultsCSV } from '@/services/hourly-results-csv.service';
import { WeightTable } from '@/core/weight-table';
import { getErrorMessage } from '@/core/errors';
import { logger } from '@/utils/logger';

interface CLIArgs {
  cellId?: number;
  seed?: number;
  from?: Date;
  to?: Date;
  weightsFile?: string;
  exportFile?: string;
}

function parseDateArg(name: string, value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    console.error(`Error: ${name} must be an ISO date, got ${value}`);
    process.exit(1);
  }
  return date;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--cell-id':
        parsed.cellId = Number(args[++i]);
        break;
      case '--seed':
        parsed.seed = Number(args[++i]);
        break;
      case '--from':
        parsed.from = parseDateArg('--from', args[++i]);
        break;
      case '--to':
        parsed.to = parseDateArg('--to', args[++i]);
        break;
      case '--weights-file':
        parsed.weightsFile = args[++i];
        break;
      case '--export':
        parsed.exportFile = args[++i];
        break;
    }
  }

  return parsed;
}

async function main() {
  const args = parseArgs();

  if (args.cellId !== undefined && !Number.isInteger(args.cellId)) {
    console.error('Error: --cell-id must be an integer');
    process.exit(1);
  }
  if (args.seed !== undefined && (!Number.isSafeInteger(args.seed) || args.seed < 0)) {
    console.error('Error: --seed must be a non-negative integer');
    process.exit(1);
  }
  if (args.weightsFile && args.cellId === undefined) {
    console.error('Error: --weights-file needs --cell-id');
    process.exit(1);
  }

  try {
    await connectDB();
    logger.info('✓ MongoDB connected');

    const options: DisaggregationRunOptions = {
      cellId: args.cellId,
      baseSeed: args.seed,
      from: args.from,
      to: args.to,
      keepResults: args.exportFile !== undefined,
    };

    if (args.weightsFile && args.cellId !== undefined) {
      const { entries, result } = await importWeightTableCSV(args.cellId, path.resolve(args.weightsFile));
      console.log(`Weights: ${result.accepted} accepted, ${result.rejected.length} rejected, ${result.duplicates} duplicates`);
      options.weightTable = WeightTable.fromEntries(entries);
    }

    const report = await runDisaggregation(options);

    console.log('\n=== Disaggregation Report ===');
    console.log(`Base Seed: ${report.base_seed}${args.seed === undefined ? ` (${Config.DISAGGREGATION.BASE_SEED_SOURCE})` : ''}`);
    console.log(`Blocks: ${report.processed_blocks}/${report.total_blocks}`);
    console.log(`Hourly Values Written: ${report.results_written}`);
    console.log(`Match Levels: FINE ${report.match_stats.FINE}, FALLBACK ${report.match_stats.FALLBACK}, COARSE ${report.match_stats.COARSE}`);
    console.log(`Invalid Blocks: ${report.invalid_blocks.length}`);
    console.log(`No Climatological Basis: ${report.no_climatological_basis.length}`);
    console.log(`Sum Invariant Violations: ${report.sum_invariant_violations.length}`);
    console.log(`Aborted Blocks: ${report.aborted_blocks.length}`);
    console.log(`Write Failures: ${report.write_failures.length}`);
    console.log(`Max Deviation (3h vs sum of 1h): ${report.max_sum_deviation.toExponential(3)}`);
    console.log(`Processing Time: ${report.processing_time_ms}ms`);

    if (args.exportFile && report.results) {
      const rows = await exportHourlyResultsCSV(report.results, path.resolve(args.exportFile));
      console.log(`Exported ${rows} hourly values to ${args.exportFile}`);
    }

    for (const failure of report.write_failures) {
      console.error(`Write failed for cells ${failure.cell_ids.join(', ')}: ${failure.error}`);
    }

    await disconnectDB();
    process.exit(report.sum_invariant_violations.length > 0 || report.write_failures.length > 0 ? 1 : 0);

  } catch (error) {
    logger.error('Disaggregation failed', { error: getErrorMessage(error) });
    await disconnectDB();
    process.exit(1);
  }
}

void main();
