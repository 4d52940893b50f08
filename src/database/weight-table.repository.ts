import { FilterQuery } from 'mongoose';
import WeightTripleRecord, { IWeightTripleRecord } from '@/models/WeightTripleRecord';
import WeightGeneration from '@/models/WeightGeneration';
import { WeightTable, WeightTableEntry, formatWeightKey } from '@/core/weight-table';
import { WeightTriple } from '@/core/weight-triple';
import { MalformedTripleError } from '@/core/errors';
import { WeightGranularity } from '@/config/index';
import { MalformedTripleReport } from '@/types/run.types';

export interface StoredWeightTable {
  table: WeightTable;
  malformed: MalformedTripleReport[];
  // Cells whose stored generation was built at another granularity
  granularity_mismatches: Array<{ cell_id: number; granularity: WeightGranularity }>;
}

/**
 * Replaces the triples of a cell with a new generation.
 *
 * The new triples are inserted first and the cell's generation pointer is
 * moved to them only after the insert succeeds. The previous generation is
 * kept for readers that already hold the old pointer; older ones are removed.
 * A failed insert removes its own partial generation and leaves the current
 * one in place.
 */
export const replaceCellWeights = async (
  cell_id: number,
  entries: readonly WeightTableEntry[],
  granularity: WeightGranularity
): Promise<number> => {
  const builtAt = new Date();

  if (entries.length > 0) {
    try {
      await WeightTripleRecord.insertMany(
        entries.map(({ key, triple }) => ({
          cell_id: key.cell_id,
          month: key.month,
          hour_bucket: key.hour_bucket,
          source_year: triple.source_year,
          weights: [...triple.weights],
          block_count: triple.block_count,
          total_mm: triple.total_mm,
          built_at: builtAt,
        }))
      );
    } catch (error) {
      await WeightTripleRecord.deleteMany({ cell_id, built_at: builtAt });
      throw error;
    }
  }

  const previous = await WeightGeneration.findOneAndUpdate(
    { cell_id },
    { cell_id, built_at: builtAt, granularity, triples: entries.length },
    { upsert: true }
  ).lean();

  const keep = previous ? [builtAt, previous.built_at] : [builtAt];
  await WeightTripleRecord.deleteMany({ cell_id, built_at: { $nin: keep } });

  return entries.length;
};

/**
 * Loads the current generation of each cell into a frozen table. Each
 * document is validated again on the way in; documents that no longer pass
 * are reported and left out.
 */
export const loadWeightTable = async (
  cell_ids?: number[],
  expectedGranularity?: WeightGranularity
): Promise<StoredWeightTable> => {
  const generations = await WeightGeneration.find(cell_ids ? { cell_id: { $in: cell_ids } } : {}).lean();

  const granularity_mismatches = generations
    .filter(generation => expectedGranularity !== undefined && generation.granularity !== expectedGranularity)
    .map(({ cell_id, granularity }) => ({ cell_id, granularity }));

  if (generations.length === 0) {
    return { table: WeightTable.fromEntries([]), malformed: [], granularity_mismatches };
  }

  const filter: FilterQuery<IWeightTripleRecord> = {
    $or: generations.map(({ cell_id, built_at }) => ({ cell_id, built_at })),
  };
  const docs = await WeightTripleRecord.find(filter).sort({ cell_id: 1, month: 1, hour_bucket: 1, source_year: 1 }).lean();

  const entries: WeightTableEntry[] = [];
  const malformed: MalformedTripleReport[] = [];

  for (const doc of docs) {
    const key = { cell_id: doc.cell_id, month: doc.month, hour_bucket: doc.hour_bucket ?? null };
    try {
      const triple = WeightTriple.fromWeights(doc.weights, doc.source_year, {
        block_count: doc.block_count,
        total_mm: doc.total_mm,
      });
      entries.push({ key, triple });
    } catch (error) {
      if (!(error instanceof MalformedTripleError)) {
        throw error;
      }
      malformed.push({ weight_key: formatWeightKey(key), source_year: doc.source_year, error: error.message });
    }
  }

  return { table: WeightTable.fromEntries(entries), malformed, granularity_mismatches };
};
