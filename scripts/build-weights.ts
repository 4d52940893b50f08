#!/usr/bin/env ts-node
/**
 * CLI script to aggregate observed history and rebuild weight triples
 *
 * Usage:
 *   npm run build-weights
 *   npm run build-weights -- --cell-id 7
 *   npm run build-weights -- --cell-id 7 --export weights/cell-7.csv
 */

import path from 'path';
import { connectDB, disconnectDB } from '@/database/connection';
import { loadWeightTable } from '@/database/weight-table.repository';
import { refreshWeightTables } from '@/jobs/weight-table.job';
import { exportWeightTableCSV } from '@/services/weight-table-csv.service';
import { getErrorMessage } from '@/core/errors';
import { logger } from '@/utils/logger';

interface CLIArgs {
  cellId?: number;
  exportFile?: string;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--cell-id':
        parsed.cellId = Number(args[++i]);
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
  if (args.exportFile && args.cellId === undefined) {
    console.error('Error: --export needs --cell-id');
    process.exit(1);
  }

  try {
    await connectDB();
    logger.info('✓ MongoDB connected');

    const result = await refreshWeightTables(args.cellId === undefined ? undefined : [args.cellId]);

    console.log('\n=== Weight Build Results ===');
    console.log(`Cells Processed: ${result.cells_processed}`);
    console.log(`Cells Skipped: ${result.cells_skipped}`);
    console.log(`Hourly Totals Written: ${result.hourly_totals_written}`);
    console.log(`Triples Written: ${result.triples_written}`);
    for (const build of result.builds) {
      console.log(`  cell ${build.cell_id}: ${build.valid_blocks}/${build.blocks_seen} blocks used, ${build.gap_blocks} with gaps, ${build.zero_blocks} dry, ${build.keys} keys`);
    }
    result.errors.forEach(err => console.log(`  ✗ cell ${err.cell_id}: ${err.error}`));

    if (args.exportFile && args.cellId !== undefined) {
      const { table } = await loadWeightTable([args.cellId]);
      const rows = await exportWeightTableCSV(table, args.cellId, path.resolve(args.exportFile));
      console.log(`Exported ${rows} triples to ${args.exportFile}`);
    }

    await disconnectDB();
    process.exit(result.errors.length > 0 ? 1 : 0);

  } catch (error) {
    logger.error('Weight build failed', { error: getErrorMessage(error) });
    await disconnectDB();
    process.exit(1);
  }
}

void main();
