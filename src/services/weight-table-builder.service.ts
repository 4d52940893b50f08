import { DataGapError, MalformedTripleError, getErrorMessage } from '@/core/errors';
import { WeightTableEntry, coarsenKey, formatWeightKey } from '@/core/weight-table';
import { WeightTriple } from '@/core/weight-triple';
import { WeightGranularity } from '@/config/index';
import { HourlyTotal, WeightKey } from '@/types/precipitation.types';
import { WeightBuildResult } from '@/types/run.types';
import { BLOCK_HOURS, HOUR_MS, getBlockWindow, getUTCMonth, getUTCYear } from '@/utils/time-window.utils';
import { logger } from '@/utils/logger';

export interface WeightBuildOptions {
  granularity: WeightGranularity;
}

interface YearAccumulator {
  key: WeightKey;
  year: number;
  sums: [number, number, number];
  block_count: number;
  total_mm: number;
}

/**
 * Turn one cell's hourly history into candidate weight triples.
 *
 * Each 3-hour block on the 00/03/.../21 schedule whose three hours are usable
 * and whose total is positive contributes its hourly amounts to the
 * accumulator of its (key, year). A year's triple for a key is the composite
 * of all its blocks: per-position sums over the grand sum. Years are never
 * averaged together; every year stays a separate candidate.
 *
 * With `month-hour` granularity both (cell, month, hour_bucket) and the
 * coarser (cell, month) entries are produced so the resolver can fall back.
 */
export function buildWeightTable(
  cellId: number,
  hourlyTotals: readonly HourlyTotal[],
  options: WeightBuildOptions
): { entries: WeightTableEntry[]; result: WeightBuildResult } {
  const result: WeightBuildResult = {
    cell_id: cellId,
    blocks_seen: 0,
    valid_blocks: 0,
    gap_blocks: 0,
    zero_blocks: 0,
    keys: 0,
    triples: 0,
    malformed_triples: [],
  };

  const byHour = new Map<number, HourlyTotal>();
  const blockStarts = new Set<number>();
  for (const total of hourlyTotals) {
    if (total.cell_id !== cellId) {
      continue;
    }
    byHour.set(total.hour.getTime(), total);
    blockStarts.add(getBlockWindow(total.hour).start.getTime());
  }

  const accumulators = new Map<string, YearAccumulator>();

  const accumulate = (key: WeightKey, year: number, values: readonly number[], blockTotal: number) => {
    const id = `${formatWeightKey(key)}@${year}`;
    let acc = accumulators.get(id);
    if (!acc) {
      acc = { key, year, sums: [0, 0, 0], block_count: 0, total_mm: 0 };
      accumulators.set(id, acc);
    }
    acc.sums[0] += values[0];
    acc.sums[1] += values[1];
    acc.sums[2] += values[2];
    acc.block_count++;
    acc.total_mm += blockTotal;
  };

  for (const startMs of [...blockStarts].sort((a, b) => a - b)) {
    result.blocks_seen++;
    const blockStart = new Date(startMs);

    const values: number[] = [];
    for (let offset = 0; offset < BLOCK_HOURS; offset++) {
      const total = byHour.get(startMs + offset * HOUR_MS);
      if (!total || total.status === 'NO_DATA' || total.value_mm === null) {
        break;
      }
      values.push(total.value_mm);
    }

    if (values.length < BLOCK_HOURS) {
      result.gap_blocks++;
      logger.debug(new DataGapError(cellId, blockStart, 'block has hours without data').message);
      continue;
    }

    const blockTotal = values[0] + values[1] + values[2];
    if (blockTotal === 0) {
      // No rain, no shape
      result.zero_blocks++;
      continue;
    }

    result.valid_blocks++;
    const window = getBlockWindow(blockStart);
    const year = getUTCYear(blockStart);
    const coarseKey: WeightKey = { cell_id: cellId, month: getUTCMonth(blockStart), hour_bucket: null };

    accumulate(coarseKey, year, values, blockTotal);
    if (options.granularity === 'month-hour') {
      accumulate({ ...coarseKey, hour_bucket: window.hour_bucket }, year, values, blockTotal);
    }
  }

  const entries: WeightTableEntry[] = [];
  const keyIds = new Set<string>();

  for (const acc of accumulators.values()) {
    try {
      const triple = WeightTriple.fromShares(acc.sums, acc.year, {
        block_count: acc.block_count,
        total_mm: acc.total_mm,
      });
      entries.push({ key: acc.key, triple });
      keyIds.add(formatWeightKey(acc.key));
    } catch (error) {
      if (!(error instanceof MalformedTripleError)) {
        throw error;
      }
      result.malformed_triples.push({
        weight_key: formatWeightKey(acc.key),
        source_year: acc.year,
        error: getErrorMessage(error),
      });
      logger.warn(`Excluded malformed triple for ${formatWeightKey(acc.key)} (${acc.year})`, {
        cell_id: cellId,
        error: getErrorMessage(error),
      });
    }
  }

  result.keys = keyIds.size;
  result.triples = entries.length;

  logger.info(`Built ${result.triples} weight triples over ${result.keys} keys for cell ${cellId}`, {
    cell_id: cellId,
    granularity: options.granularity,
    blocks_seen: result.blocks_seen,
    valid_blocks: result.valid_blocks,
    gap_blocks: result.gap_blocks,
    zero_blocks: result.zero_blocks,
    malformed: result.malformed_triples.length,
  });

  return { entries, result };
}

/**
 * Fine keys present in a set of entries, reduced to the coarse keys they
 * would fall back to. Used to report keys that lack a coarse entry.
 */
export function listMissingCoarseKeys(entries: readonly WeightTableEntry[]): string[] {
  const coarse = new Set<string>();
  const fine = new Set<string>();
  for (const { key } of entries) {
    if (key.hour_bucket === null) {
      coarse.add(formatWeightKey(key));
    } else {
      fine.add(formatWeightKey(coarsenKey(key)));
    }
  }
  return [...fine].filter(id => !coarse.has(id)).sort();
}
