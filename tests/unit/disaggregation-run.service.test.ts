import { partitionByCell, runDisaggregation } from '@/services/disaggregation-run.service';
import * as timeseriesRepository from '@/database/timeseries.repository';
import * as weightTableRepository from '@/database/weight-table.repository';
import { WeightTable, WeightTableEntry } from '@/core/weight-table';
import { WeightTriple } from '@/core/weight-triple';
import { FutureBlock, HourlyResult } from '@/types/precipitation.types';
import { assignRecordIndices } from '@/utils/seed.utils';

jest.mock('@/database/timeseries.repository');
jest.mock('@/database/weight-table.repository');
jest.mock('@/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    notify: jest.fn(),
  },
}));

const block = (cell_id: number, iso: string, total_mm: number): FutureBlock => ({
  cell_id,
  block_start: new Date(iso),
  total_mm
});

const entriesFor = (cell_id: number): WeightTableEntry[] => [2021, 2022, 2023].map((year, i) => ({
  key: { cell_id, month: 3, hour_bucket: 0 },
  triple: WeightTriple.fromShares([1 + i, 2, 3 - i], year)
}));

describe('Disaggregation Run Service', () => {
  let written: HourlyResult[];
  let blocks: FutureBlock[];

  beforeEach(() => {
    jest.clearAllMocks();
    written = [];

    blocks = [1, 2, 3, 4, 5].flatMap(cell => [
      block(cell, '2030-03-01T00:00:00.000Z', cell * 0.5),
      block(cell, '2030-03-02T00:00:00.000Z', cell * 0.25)
    ]);
    // Cell 6 has no weights at all
    blocks.push(block(6, '2030-03-01T00:00:00.000Z', 1));

    (timeseriesRepository.findFutureBlocks as jest.Mock).mockResolvedValue({
      blocks,
      invalid: [{ cell_id: 1, timestamp: new Date('2030-03-01T01:00:00.000Z'), error: 'not on the 3-hour schedule' }]
    });
    (timeseriesRepository.upsertHourlyResults as jest.Mock).mockImplementation(async (results: HourlyResult[]) => {
      written.push(...results);
      return { upserted: results.length, modified: 0, matched: 0 };
    });
    (weightTableRepository.loadWeightTable as jest.Mock).mockResolvedValue({
      table: WeightTable.fromEntries([1, 2, 3, 4, 5].flatMap(entriesFor)),
      malformed: [],
      granularity_mismatches: []
    });
  });

  describe('partitionByCell', () => {
    it('should deal cells round-robin in ascending order', () => {
      const indexed = assignRecordIndices([
        block(3, '2030-03-01T00:00:00.000Z', 1),
        block(1, '2030-03-01T00:00:00.000Z', 1),
        block(2, '2030-03-01T00:00:00.000Z', 1),
        block(1, '2030-03-01T03:00:00.000Z', 1)
      ]);

      const partitions = partitionByCell(indexed, 2);

      expect(partitions.map(p => p.map(i => i.block.cell_id))).toEqual([[1, 1, 3], [2]]);
    });

    it('should drop empty partitions', () => {
      const indexed = assignRecordIndices([block(1, '2030-03-01T00:00:00.000Z', 1)]);
      expect(partitionByCell(indexed, 4)).toHaveLength(1);
    });
  });

  it('should report every block by outcome', async () => {
    const report = await runDisaggregation({ baseSeed: 7, workerCount: 2 });

    expect(report.base_seed).toBe(7);
    expect(report.total_blocks).toBe(12);
    expect(report.processed_blocks).toBe(10);
    expect(report.results_written).toBe(30);
    expect(report.match_stats).toEqual({ FINE: 10, FALLBACK: 0, COARSE: 0 });
    expect(report.invalid_blocks).toHaveLength(1);
    expect(report.no_climatological_basis.map(f => f.cell_id)).toEqual([6]);
    expect(report.sum_invariant_violations).toEqual([]);
  });

  it('should write one batch per partition', async () => {
    await runDisaggregation({ baseSeed: 7, workerCount: 3 });

    expect(timeseriesRepository.upsertHourlyResults).toHaveBeenCalledTimes(3);
  });

  it('should give the same results whatever the worker count', async () => {
    await runDisaggregation({ baseSeed: 7, workerCount: 1 });
    const single = [...written].sort((a, b) => a.record_index - b.record_index || a.hour_in_block - b.hour_in_block);

    written = [];
    await runDisaggregation({ baseSeed: 7, workerCount: 4 });
    const parallel = [...written].sort((a, b) => a.record_index - b.record_index || a.hour_in_block - b.hour_in_block);

    expect(parallel).toEqual(single);
  });

  it('should load weights only for the cells it has blocks for', async () => {
    await runDisaggregation({ baseSeed: 7 });

    expect(weightTableRepository.loadWeightTable).toHaveBeenCalledWith([1, 2, 3, 4, 5, 6], 'month-hour');
  });

  it('should use a supplied weight table instead of the stored one', async () => {
    const report = await runDisaggregation({
      baseSeed: 7,
      weightTable: WeightTable.fromEntries(entriesFor(1))
    });

    expect(weightTableRepository.loadWeightTable).not.toHaveBeenCalled();
    expect(report.processed_blocks).toBe(2);
    expect(report.no_climatological_basis).toHaveLength(9);
  });

  it('should pass the window and cell through to the store', async () => {
    const from = new Date('2030-03-01T00:00:00.000Z');
    const to = new Date('2030-04-01T00:00:00.000Z');

    await runDisaggregation({ from, to, cellId: 3, baseSeed: 7 });

    expect(timeseriesRepository.findFutureBlocks).toHaveBeenCalledWith({ from, to, cell_id: 3 });
  });

  it('should keep the report when one partition fails to write', async () => {
    (timeseriesRepository.upsertHourlyResults as jest.Mock).mockImplementation(async (results: HourlyResult[]) => {
      if (results.some(r => r.cell_id === 2)) {
        throw new Error('write failed for cell 2');
      }
      written.push(...results);
      return { upserted: results.length, modified: 0, matched: 0 };
    });

    const report = await runDisaggregation({ baseSeed: 7, workerCount: 2 });

    expect(report.write_failures).toEqual([{ cell_ids: [2, 4, 6], results: 12, error: 'write failed for cell 2' }]);
    expect(report.processed_blocks).toBe(6);
    expect(report.results_written).toBe(18);
    expect(report.match_stats).toEqual({ FINE: 6, FALLBACK: 0, COARSE: 0 });
    expect(report.no_climatological_basis.map(f => f.cell_id)).toEqual([6]);
    expect([...new Set(written.map(r => r.cell_id))]).toEqual([1, 3, 5]);
  });

  it('should rethrow when the blocks cannot be read', async () => {
    (timeseriesRepository.findFutureBlocks as jest.Mock).mockRejectedValue(new Error('connection reset'));

    await expect(runDisaggregation({ baseSeed: 7 })).rejects.toThrow('connection reset');
  });

  it('should return the written results when asked to keep them', async () => {
    const report = await runDisaggregation({ baseSeed: 7, workerCount: 3, keepResults: true });

    expect(report.results).toHaveLength(30);
    expect(report.results?.map(r => r.record_index)).toEqual(written.map(r => r.record_index).sort((a, b) => a - b));
    expect(report.max_sum_deviation).toBeLessThan(1e-12);
  });

  it('should leave results off the report by default', async () => {
    const report = await runDisaggregation({ baseSeed: 7 });

    expect(report.results).toBeUndefined();
    expect(report.write_failures).toEqual([]);
  });
});
