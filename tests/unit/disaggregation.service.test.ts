import {
  DisaggregationOptions,
  disaggregateBlock,
  disaggregatePartition,
  isSumPreserved
} from '@/services/disaggregation.service';
import { CandidateSource, WeightTable, WeightTableEntry } from '@/core/weight-table';
import { WeightCandidate, WeightTriple } from '@/core/weight-triple';
import { NoClimatologicalBasisError } from '@/core/errors';
import { FutureBlock } from '@/types/precipitation.types';
import { assignRecordIndices } from '@/utils/seed.utils';

const HOUR_MS = 60 * 60 * 1000;

const block = (cell_id: number, iso: string, total_mm: number): FutureBlock => ({
  cell_id,
  block_start: new Date(iso),
  total_mm
});

const januaryEntries = (cell_id: number, hour_bucket: number | null): WeightTableEntry[] => [
  { key: { cell_id, month: 1, hour_bucket }, triple: WeightTriple.fromWeights([0.399, 0.255, 0.346], 2023) },
  { key: { cell_id, month: 1, hour_bucket }, triple: WeightTriple.fromWeights([0.348, 0.262, 0.390], 2024) },
  { key: { cell_id, month: 1, hour_bucket }, triple: WeightTriple.fromWeights([0.287, 0.356, 0.357], 2025) }
];

const options = (overrides: Partial<DisaggregationOptions> = {}): DisaggregationOptions => ({
  granularity: 'month-hour',
  fallbackEnabled: true,
  minFineCandidates: 1,
  baseSeed: 42,
  sumTolerance: 1e-9,
  ...overrides
});

describe('Disaggregation Service', () => {
  describe('isSumPreserved', () => {
    it('should use a tolerance relative to the total', () => {
      expect(isSumPreserved(1000, [500, 250, 250.0000001], 1e-9)).toBe(true);
      expect(isSumPreserved(1000, [500, 250, 250.00001], 1e-9)).toBe(false);
      expect(isSumPreserved(0, [0, 0, 0], 1e-9)).toBe(true);
    });
  });

  describe('disaggregateBlock', () => {
    it('should split a 0.5 mm January block with the 2024 triple', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));
      const future = block(1, '2030-01-10T00:00:00.000Z', 0.5);

      // 0.5 falls into the middle of three candidates ordered 2023, 2024, 2025
      const { results, source_year, deviation } = disaggregateBlock(future, 0, table, options({ randomFactory: () => () => 0.5 }));

      expect(source_year).toBe(2024);
      expect(deviation).toBeLessThan(1e-15);
      expect(results.map(r => r.hour_timestamp)).toEqual([
        new Date('2030-01-10T00:00:00.000Z'),
        new Date('2030-01-10T01:00:00.000Z'),
        new Date('2030-01-10T02:00:00.000Z')
      ]);
      expect(results[0].value_mm).toBeCloseTo(0.174, 12);
      expect(results[1].value_mm).toBeCloseTo(0.131, 12);
      expect(results[2].value_mm).toBeCloseTo(0.195, 12);
      expect(results.reduce((sum, r) => sum + r.value_mm, 0)).toBeCloseTo(0.5, 12);
      expect(results.every(r => r.match_level === 'FINE' && r.weight_key === '1:M01:H00')).toBe(true);
    });

    it('should draw years from the seeded generator', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));
      const future = block(1, '2030-01-10T00:00:00.000Z', 0.5);

      // Seeds 42, 43 and 45 open with 0.601, 0.9998 and 0.037
      expect(disaggregateBlock(future, 0, table, options()).source_year).toBe(2024);
      expect(disaggregateBlock(future, 1, table, options()).source_year).toBe(2025);
      expect(disaggregateBlock(future, 3, table, options()).source_year).toBe(2023);
    });

    it('should carry the block total on every hourly result', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));

      const { results } = disaggregateBlock(block(1, '2030-01-10T00:00:00.000Z', 2.5), 0, table, options());

      expect(results.map(r => r.block_total_mm)).toEqual([2.5, 2.5, 2.5]);
    });

    it('should record the seed derived from the record index', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));

      const { seed, results } = disaggregateBlock(block(1, '2030-01-10T00:00:00.000Z', 1), 5, table, options());

      expect(seed).toBe(47);
      expect(results.every(r => r.seed === 47 && r.record_index === 5)).toBe(true);
    });

    it('should return three zeros for a zero total', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));

      const { results } = disaggregateBlock(block(1, '2030-01-10T00:00:00.000Z', 0), 0, table, options());

      expect(results.map(r => r.value_mm)).toEqual([0, 0, 0]);
    });

    it('should be deterministic for the same seed and index', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));
      const future = block(1, '2030-01-10T00:00:00.000Z', 2.7);

      const first = disaggregateBlock(future, 11, table, options());
      const second = disaggregateBlock(future, 11, table, options());

      expect(second.results).toEqual(first.results);
    });

    it('should fall back to the month key for cell 7, January, 00 UTC', () => {
      const table = WeightTable.fromEntries(januaryEntries(7, null));

      const { results, resolution } = disaggregateBlock(block(7, '2030-01-01T00:00:00.000Z', 3), 0, table, options());

      expect(resolution.match_level).toBe('FALLBACK');
      expect(results).toHaveLength(3);
      expect(results.reduce((sum, r) => sum + r.value_mm, 0)).toBeCloseTo(3, 12);
    });

    it('should throw when no key has candidates', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));

      expect(() => disaggregateBlock(block(2, '2030-01-10T00:00:00.000Z', 1), 0, table, options()))
        .toThrow(NoClimatologicalBasisError);
    });
  });

  describe('disaggregatePartition', () => {
    const manyBlocks = (cell_id: number, count: number): FutureBlock[] =>
      Array.from({ length: count }, (_, i) =>
        block(cell_id, new Date(Date.UTC(2030, 0, 1) + i * 24 * HOUR_MS).toISOString(), (i % 7) * 0.37 + 0.05)
      );

    it('should preserve every block total', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));
      const blocks = manyBlocks(1, 31);

      const outcome = disaggregatePartition(assignRecordIndices(blocks), table, options());

      expect(outcome.processed_blocks).toBe(31);
      expect(outcome.results).toHaveLength(93);
      for (const future of blocks) {
        const values = outcome.results
          .filter(r => r.block_start.getTime() === future.block_start.getTime())
          .map(r => r.value_mm);
        expect(isSumPreserved(future.total_mm, values, 1e-9)).toBe(true);
      }
    });

    it('should change the draws when the base seed changes', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));
      const indexed = assignRecordIndices(manyBlocks(1, 31));

      const first = disaggregatePartition(indexed, table, options({ baseSeed: 1 }));
      const second = disaggregatePartition(indexed, table, options({ baseSeed: 1000 }));

      expect(second.results.map(r => r.source_year)).not.toEqual(first.results.map(r => r.source_year));
      expect(second.results.reduce((s, r) => s + r.value_mm, 0)).toBeCloseTo(first.results.reduce((s, r) => s + r.value_mm, 0), 9);
    });

    it('should not repeat draws for base seeds 2^32 apart', () => {
      const years = [2021, 2022, 2023, 2024, 2025];
      const table = WeightTable.fromEntries(years.map(year => ({
        key: { cell_id: 1, month: 1, hour_bucket: null },
        triple: WeightTriple.fromShares([1, 1, year - 2020], year)
      })));
      const indexed = assignRecordIndices(Array.from({ length: 50 }, (_, i) =>
        block(1, new Date(Date.UTC(2030, 0, 1) + i * 3 * HOUR_MS).toISOString(), 1)
      ));
      const monthOnly = (baseSeed: number) => options({ granularity: 'month-only', baseSeed });

      const low = disaggregatePartition(indexed, table, monthOnly(0));
      const high = disaggregatePartition(indexed, table, monthOnly(2 ** 32));

      expect(low.processed_blocks).toBe(50);
      expect(high.results.map(r => r.source_year)).not.toEqual(low.results.map(r => r.source_year));
    });

    it('should report the largest deviation between a block and its hours', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));

      const outcome = disaggregatePartition(assignRecordIndices(manyBlocks(1, 31)), table, options());

      expect(outcome.max_sum_deviation).toBeGreaterThanOrEqual(0);
      expect(outcome.max_sum_deviation).toBeLessThan(1e-12);
    });

    it('should report blocks without a climatological basis and continue', () => {
      const table = WeightTable.fromEntries(januaryEntries(1, 0));
      const indexed = assignRecordIndices([
        block(1, '2030-01-10T00:00:00.000Z', 1),
        block(2, '2030-01-10T00:00:00.000Z', 1)
      ]);

      const outcome = disaggregatePartition(indexed, table, options());

      expect(outcome.processed_blocks).toBe(1);
      expect(outcome.match_stats).toEqual({ FINE: 1, FALLBACK: 0, COARSE: 0 });
      expect(outcome.no_climatological_basis).toEqual([{
        cell_id: 2,
        timestamp: new Date('2030-01-10T00:00:00.000Z'),
        weight_key: undefined,
        error: 'No candidate weight triples for cell 2 at 2030-01-10T00:00:00.000Z (tried 2:M01:H00, 2:M01)'
      }]);
    });

    it('should drop a whole weight key after a sum invariant violation', () => {
      const corrupt: WeightCandidate = { weights: [0.5, 0.5, 0.5], source_year: 2020 };
      const sound: WeightCandidate = { weights: [0.2, 0.3, 0.5], source_year: 2021 };
      const source: CandidateSource = {
        getCandidates: (key) => {
          if (key.hour_bucket === 0) {
            return [corrupt];
          }
          return key.hour_bucket === 3 ? [sound] : [];
        }
      };

      const indexed = assignRecordIndices([
        block(5, '2030-01-01T00:00:00.000Z', 0),
        block(5, '2030-01-01T03:00:00.000Z', 1),
        block(5, '2030-01-02T00:00:00.000Z', 1),
        block(5, '2030-01-03T00:00:00.000Z', 2)
      ]);

      const outcome = disaggregatePartition(indexed, source, options());

      // The dry block passed on its own but came from the same key
      expect(outcome.sum_invariant_violations.map(f => f.timestamp.toISOString())).toEqual(['2030-01-02T00:00:00.000Z']);
      expect(outcome.sum_invariant_violations[0].weight_key).toBe('5:M01:H00');
      expect(outcome.aborted_blocks.map(f => f.timestamp.toISOString())).toEqual([
        '2030-01-01T00:00:00.000Z',
        '2030-01-03T00:00:00.000Z'
      ]);
      expect(outcome.processed_blocks).toBe(1);
      expect(outcome.results.map(r => r.value_mm)).toEqual([0.2, 0.3, 0.5]);
      expect(outcome.max_sum_deviation).toBe(0);
      expect(outcome.results.every(r => r.weight_key === '5:M01:H03')).toBe(true);
    });

    it('should order results by record index and hour', () => {
      const table = WeightTable.fromEntries([...januaryEntries(1, 0), ...januaryEntries(1, 3)]);
      const indexed = assignRecordIndices([
        block(1, '2030-01-01T03:00:00.000Z', 1),
        block(1, '2030-01-01T00:00:00.000Z', 1)
      ]);

      const outcome = disaggregatePartition(indexed, table, options());

      expect(outcome.results.map(r => [r.record_index, r.hour_in_block])).toEqual([
        [0, 0], [0, 1], [0, 2], [1, 0], [1, 1], [1, 2]
      ]);
    });
  });
});
