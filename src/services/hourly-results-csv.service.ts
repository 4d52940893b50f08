import fs from 'fs';
import path from 'path';
import moment from 'moment';
import { HourlyResult } from '@/types/precipitation.types';
import { logger } from '@/utils/logger';

export const RESULTS_CSV_HEADER = [
  'cell_id',
  'time_3hourly',
  'pr_3hourly_original',
  'time_hourly',
  'hour_in_3h_block',
  'weight_used',
  'match_level',
  'weight_key',
  'reference',
  'pr_hourly_disaggregated',
].join(',');

const formatTime = (date: Date): string => moment.utc(date).format('YYYY-MM-DD HH:mm');

// Amounts and weights with six decimals
const formatAmount = (value: number): string => value.toFixed(6);

/**
 * One line per hourly value, ordered by cell and hour. `reference` is the
 * historical year whose triple split the block.
 */
export function formatHourlyResultsCSV(results: readonly HourlyResult[]): string {
  const rows = [...results]
    .sort((a, b) => a.cell_id - b.cell_id || a.hour_timestamp.getTime() - b.hour_timestamp.getTime())
    .map(result => [
      result.cell_id,
      formatTime(result.block_start),
      formatAmount(result.block_total_mm),
      formatTime(result.hour_timestamp),
      result.hour_in_block,
      formatAmount(result.weight),
      result.match_level,
      result.weight_key,
      result.source_year,
      formatAmount(result.value_mm),
    ].join(','));

  return [RESULTS_CSV_HEADER, ...rows].join('\n') + '\n';
}

export async function exportHourlyResultsCSV(results: readonly HourlyResult[], filePath: string): Promise<number> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, formatHourlyResultsCSV(results), 'utf8');
  logger.info(`Exported ${results.length} hourly values`, { file: filePath });
  return results.length;
}
