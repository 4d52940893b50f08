#!/usr/bin/env ts-node
/**
 * CLI script to load a `time;pr` precipitation CSV into MongoDB
 *
 * Usage:
 *   npm run load-observations -- --cell-id 7 --file data/cell-7-gauge.csv
 *   npm run load-observations -- --cell-id 7 --file data/cell-7-projection.csv --series projected_3h
 *   npm run load-observations -- --cell-id 7 --file data/cell-7-gauge.csv --dry-run
 */

import path from 'path';
import { connectDB, disconnectDB } from '@/database/connection';
import { loadPrecipitationCSV } from '@/services/observation-csv.service';
import { getErrorMessage } from '@/core/errors';
import { logger } from '@/utils/logger';

interface CLIArgs {
  cellId?: number;
  file?: string;
  series: 'observed' | 'projected_3h';
  dryRun: boolean;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {
    series: 'observed',
    dryRun: false
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--cell-id':
        parsed.cellId = Number(args[++i]);
        break;
      case '--file':
        parsed.file = args[++i];
        break;
      case '--series': {
        const series = args[++i];
        if (series !== 'observed' && series !== 'projected_3h') {
          console.error(`Error: --series must be observed or projected_3h, got ${series}`);
          process.exit(1);
        }
        parsed.series = series;
        break;
      }
      case '--dry-run':
        parsed.dryRun = true;
        break;
    }
  }

  return parsed;
}

function printUsage() {
  console.log(`
Usage:
  npm run load-observations -- --cell-id <id> --file <csv_file> [--series observed|projected_3h] [--dry-run]

Options:
  --cell-id <id>    Grid cell the file belongs to
  --file <path>     Semicolon separated file with columns time;pr
  --series <kind>   observed (default) for gauge history, projected_3h for 3-hour projections
  --dry-run         Parse the file without writing to the database
  `);
}

async function main() {
  const args = parseArgs();

  if (args.cellId === undefined || !Number.isInteger(args.cellId) || !args.file) {
    console.error('Error: --cell-id and --file are required');
    printUsage();
    process.exit(1);
  }

  try {
    if (!args.dryRun) {
      await connectDB();
      logger.info('✓ MongoDB connected');
    }

    const result = await loadPrecipitationCSV(args.cellId, path.resolve(args.file), args.series, args.dryRun);

    console.log('\n=== Loading Results ===');
    console.log(`Cell: ${result.cell_id}`);
    console.log(`Series: ${result.series}`);
    console.log(`Success: ${result.success}`);
    console.log(`Total Rows: ${result.total_rows}`);
    console.log(`Records Written: ${result.records_written}`);
    console.log(`Errors: ${result.errors.length}`);
    console.log(`Processing Time: ${result.processing_time_ms}ms`);

    if (result.errors.length > 0) {
      console.log('\nErrors:');
      result.errors.slice(0, 10).forEach(err => console.log(`  - ${err}`));
      if (result.errors.length > 10) {
        console.log(`  ... and ${result.errors.length - 10} more errors`);
      }
    }

    if (!args.dryRun) {
      await disconnectDB();
    }
    process.exit(result.success ? 0 : 1);

  } catch (error) {
    logger.error('Loading failed', { error: getErrorMessage(error) });
    await disconnectDB();
    process.exit(1);
  }
}

void main();
