import { FilterQuery } from 'mongoose';
import TimeSeriesRecord, { ITimeSeriesRecord } from '@/models/TimeSeriesRecord';
import { createFutureBlock } from '@/core/records';
import { getErrorMessage } from '@/core/errors';
import { FutureBlock, HourlyResult, Observation, SeriesKind } from '@/types/precipitation.types';
import { BlockFailure } from '@/types/run.types';

export interface FutureBlockQuery {
  from: Date;
  to: Date;
  cell_id?: number;
}

export interface FutureBlockLoad {
  blocks: FutureBlock[];
  invalid: BlockFailure[];
}

export interface WriteSummary {
  upserted: number;
  modified: number;
  matched: number;
}

const emptySummary = (): WriteSummary => ({ upserted: 0, modified: 0, matched: 0 });

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * All raw precipitation observations of one cell, oldest first.
 */
export const findPrecipitationObservations = async (cell_id: number): Promise<Observation[]> => {
  const docs = await TimeSeriesRecord.find({
    cell_id,
    variable: 'precipitation',
    series: 'observed',
  }).sort({ timestamp: 1 }).lean();

  return docs.map(doc => ({
    timestamp: doc.timestamp,
    cell_id: doc.cell_id,
    variable: doc.variable,
    value: doc.value,
  }));
};

/**
 * Projected 3-hour totals in [from, to). Records that fail block validation
 * are returned separately instead of aborting the load.
 */
export const findFutureBlocks = async (query: FutureBlockQuery): Promise<FutureBlockLoad> => {
  const filter: FilterQuery<ITimeSeriesRecord> = {
    variable: 'precipitation',
    series: 'projected_3h',
    timestamp: { $gte: query.from, $lt: query.to },
  };
  if (query.cell_id !== undefined) {
    filter.cell_id = query.cell_id;
  }

  const docs = await TimeSeriesRecord.find(filter).sort({ cell_id: 1, timestamp: 1 }).lean();

  const result: FutureBlockLoad = { blocks: [], invalid: [] };
  for (const doc of docs) {
    try {
      result.blocks.push(createFutureBlock({ timestamp: doc.timestamp, cell_id: doc.cell_id, value: doc.value }));
    } catch (error) {
      result.invalid.push({ cell_id: doc.cell_id, timestamp: doc.timestamp, error: getErrorMessage(error) });
    }
  }
  return result;
};

/**
 * Distinct cells holding precipitation data in a series, ascending.
 */
export const listCellIds = async (series: SeriesKind): Promise<number[]> => {
  const ids = await TimeSeriesRecord.distinct('cell_id', { series, variable: 'precipitation' });
  return ids.filter((id): id is number => typeof id === 'number').sort((a, b) => a - b);
};

/**
 * Upserts raw values keyed by (timestamp, cell_id, variable, series), so
 * loading the same file twice leaves one record per timestamp.
 */
export const upsertSeriesValues = async (
  series: Extract<SeriesKind, 'observed' | 'projected_3h'>,
  records: ReadonlyArray<Pick<ITimeSeriesRecord, 'timestamp' | 'cell_id' | 'variable' | 'value'>>,
  batchSize: number
): Promise<WriteSummary> => {
  const summary = emptySummary();

  for (const batch of chunk(records, batchSize)) {
    const res = await TimeSeriesRecord.bulkWrite(
      batch.map(record => ({
        updateOne: {
          filter: { timestamp: record.timestamp, cell_id: record.cell_id, variable: record.variable, series },
          update: { $set: { value: record.value } },
          upsert: true,
        },
      })),
      { ordered: false }
    );
    summary.upserted += res.upsertedCount;
    summary.modified += res.modifiedCount;
    summary.matched += res.matchedCount;
  }

  return summary;
};

/**
 * Writes hourly results as `disaggregated_1h` records. Keyed on
 * (cell_id, hour_timestamp); a re-run overwrites rather than duplicates.
 */
export const upsertHourlyResults = async (
  results: readonly HourlyResult[],
  batchSize: number
): Promise<WriteSummary> => {
  const summary = emptySummary();

  for (const batch of chunk(results, batchSize)) {
    const res = await TimeSeriesRecord.bulkWrite(
      batch.map(result => ({
        updateOne: {
          filter: {
            timestamp: result.hour_timestamp,
            cell_id: result.cell_id,
            variable: 'precipitation' as const,
            series: 'disaggregated_1h' as const,
          },
          update: {
            $set: {
              value: result.value_mm,
              meta: {
                block_start: result.block_start,
                block_total_mm: result.block_total_mm,
                hour_in_block: result.hour_in_block,
                weight: result.weight,
                source_year: result.source_year,
                match_level: result.match_level,
                weight_key: result.weight_key,
                record_index: result.record_index,
                seed: result.seed,
              },
            },
          },
          upsert: true,
        },
      })),
      { ordered: false }
    );
    summary.upserted += res.upsertedCount;
    summary.modified += res.modifiedCount;
    summary.matched += res.matchedCount;
  }

  return summary;
};
