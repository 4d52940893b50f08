import { buildWeightTable, listMissingCoarseKeys } from '@/services/weight-table-builder.service';
import { WeightTable, formatWeightKey } from '@/core/weight-table';
import { WeightTriple } from '@/core/weight-triple';
import { HourlyTotal } from '@/types/precipitation.types';
import { logger } from '@/utils/logger';

jest.mock('@/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const HOUR_MS = 60 * 60 * 1000;

// Consecutive hourly totals for cell 7 starting at `iso`; null means NO_DATA
const hours = (iso: string, values: Array<number | null>): HourlyTotal[] =>
  values.map((value, i) => ({
    cell_id: 7,
    hour: new Date(new Date(iso).getTime() + i * HOUR_MS),
    value_mm: value,
    status: value === null ? 'NO_DATA' : 'OBSERVED',
    observation_count: value === null ? 0 : 4,
    fill_policy: 'exclude'
  }));

describe('Weight Table Builder Service', () => {
  let history: HourlyTotal[];

  beforeEach(() => {
    jest.clearAllMocks();

    history = [
      ...hours('2023-01-05T00:00:00.000Z', [1, 1, 2]),
      ...hours('2023-01-06T00:00:00.000Z', [1, 3, 0]),
      ...hours('2024-01-05T00:00:00.000Z', [0, 0, 0]),
      ...hours('2024-01-05T03:00:00.000Z', [2, 1, 1]),
      ...hours('2024-01-06T00:00:00.000Z', [0.4, null, 0.2])
    ];
  });

  it('should classify every block it sees', () => {
    const { result } = buildWeightTable(7, history, { granularity: 'month-hour' });

    expect(result.blocks_seen).toBe(5);
    expect(result.valid_blocks).toBe(3);
    expect(result.zero_blocks).toBe(1);
    expect(result.gap_blocks).toBe(1);
  });

  it('should combine all blocks of a year into one composite triple per key', () => {
    const { entries } = buildWeightTable(7, history, { granularity: 'month-hour' });
    const table = WeightTable.fromEntries(entries);

    const fine2023 = table.getCandidates({ cell_id: 7, month: 1, hour_bucket: 0 });
    expect(fine2023).toHaveLength(1);
    expect(fine2023[0].source_year).toBe(2023);
    expect(fine2023[0].weights).toEqual([0.25, 0.5, 0.25]);
  });

  it('should keep each year as its own candidate at the month level', () => {
    const { entries, result } = buildWeightTable(7, history, { granularity: 'month-hour' });
    const table = WeightTable.fromEntries(entries);

    const coarse = table.getCandidates({ cell_id: 7, month: 1, hour_bucket: null });
    expect(coarse.map(c => c.source_year)).toEqual([2023, 2024]);
    expect(coarse[1].weights).toEqual([0.5, 0.25, 0.25]);
    expect(result.keys).toBe(3);
    expect(result.triples).toBe(4);
  });

  it('should record provenance on each triple', () => {
    const { entries } = buildWeightTable(7, history, { granularity: 'month-hour' });
    const triple = entries.find(e => formatWeightKey(e.key) === '7:M01:H00')?.triple;

    expect(triple).toBeInstanceOf(WeightTriple);
    expect(triple?.block_count).toBe(2);
    expect(triple?.total_mm).toBe(8);
  });

  it('should only produce month keys at month-only granularity', () => {
    const { entries, result } = buildWeightTable(7, history, { granularity: 'month-only' });

    expect(entries.every(e => e.key.hour_bucket === null)).toBe(true);
    expect(result.keys).toBe(1);
    expect(result.triples).toBe(2);
  });

  it('should ignore totals from other cells', () => {
    const other = hours('2023-02-01T00:00:00.000Z', [1, 1, 1]).map(t => ({ ...t, cell_id: 8 }));
    const { result } = buildWeightTable(7, [...history, ...other], { granularity: 'month-hour' });

    expect(result.blocks_seen).toBe(5);
  });

  it('should exclude triples it cannot validate and carry on', () => {
    const ancient = hours('0500-03-01T00:00:00.000Z', [1, 1, 1]);
    const { entries, result } = buildWeightTable(7, [...history, ...ancient], { granularity: 'month-hour' });

    expect(result.malformed_triples.map(m => m.weight_key).sort()).toEqual(['7:M03', '7:M03:H00']);
    expect(result.malformed_triples[0].source_year).toBe(500);
    expect(entries).toHaveLength(4);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  describe('listMissingCoarseKeys', () => {
    it('should report months that only have fine keys', () => {
      const triple = WeightTriple.fromShares([1, 1, 1], 2023);

      expect(listMissingCoarseKeys([
        { key: { cell_id: 7, month: 1, hour_bucket: 0 }, triple },
        { key: { cell_id: 7, month: 1, hour_bucket: null }, triple },
        { key: { cell_id: 7, month: 2, hour_bucket: 3 }, triple }
      ])).toEqual(['7:M02']);
    });
  });
});
