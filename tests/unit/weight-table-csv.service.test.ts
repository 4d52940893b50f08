import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  WEIGHT_CSV_HEADER,
  exportWeightTableCSV,
  formatWeightTableCSV,
  importWeightTableCSV
} from '@/services/weight-table-csv.service';
import { WeightTable, WeightTableEntry } from '@/core/weight-table';
import { WeightTriple } from '@/core/weight-triple';

jest.mock('@/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('Weight Table CSV Service', () => {
  let tmpDir: string;

  const entries: WeightTableEntry[] = [
    { key: { cell_id: 7, month: 1, hour_bucket: 0 }, triple: WeightTriple.fromShares([2, 1, 1], 2024) },
    { key: { cell_id: 7, month: 1, hour_bucket: null }, triple: WeightTriple.fromShares([1, 2, 1], 2023) },
    { key: { cell_id: 8, month: 1, hour_bucket: null }, triple: WeightTriple.fromShares([1, 1, 1], 2023) }
  ];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'weights-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeFile = (name: string, lines: string[]): string => {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, lines.join('\n') + '\n');
    return file;
  };

  describe('formatWeightTableCSV', () => {
    it('should write month keys before month-hour keys', () => {
      expect(formatWeightTableCSV(entries.slice(0, 2))).toBe([
        WEIGHT_CSV_HEADER,
        '2023,1,,0.25,0.5,0.25',
        '2024,1,0,0.5,0.25,0.25',
        ''
      ].join('\n'));
    });
  });

  describe('exportWeightTableCSV', () => {
    it('should export one cell and read back the same triples', async () => {
      const file = path.join(tmpDir, 'cell-7.csv');
      const table = WeightTable.fromEntries(entries);

      const rows = await exportWeightTableCSV(table, 7, file);
      const { entries: imported, result } = await importWeightTableCSV(7, file);

      expect(rows).toBe(2);
      expect(result.accepted).toBe(2);
      expect(result.rejected).toEqual([]);
      expect(WeightTable.fromEntries(imported).getCandidates({ cell_id: 7, month: 1, hour_bucket: 0 })[0].weights)
        .toEqual([0.5, 0.25, 0.25]);
    });

    it('should keep full precision', async () => {
      const file = path.join(tmpDir, 'thirds.csv');
      const table = WeightTable.fromEntries([
        { key: { cell_id: 7, month: 5, hour_bucket: null }, triple: WeightTriple.fromShares([1, 1, 1], 2022) }
      ]);

      await exportWeightTableCSV(table, 7, file);
      const lines = fs.readFileSync(file, 'utf8').split('\n');
      const { entries: imported } = await importWeightTableCSV(7, file);

      expect(lines[1].startsWith('2022,5,,0.3333333333333333,0.3333333333333333,')).toBe(true);
      expect(imported[0].triple.weights[0]).toBeCloseTo(1 / 3, 15);
    });
  });

  describe('importWeightTableCSV', () => {
    it('should reject invalid rows and keep the last of a repeated row', async () => {
      const file = writeFile('weights.csv', [
        WEIGHT_CSV_HEADER,
        '2023,1,0,0.25,0.5,0.25',
        '2023,13,0,0.25,0.5,0.25',
        '2024,1,0,0.5,0.5,0.2',
        '2024,1,4,0.5,0.25,0.25',
        '2023,1,0,0.5,0.25,0.25'
      ]);

      const { entries: imported, result } = await importWeightTableCSV(7, file);

      expect(result.total_rows).toBe(5);
      expect(result.accepted).toBe(1);
      expect(result.duplicates).toBe(1);
      expect(result.rejected.map(r => r.line)).toEqual([3, 4, 5]);
      expect(result.rejected[0].error).toBe('month must be an integer in [1, 12], got "13"');
      expect(result.rejected[2].error).toBe('hour_bucket must be one of 0,3,...,21, got 4');
      expect(imported[0].triple.weights).toEqual([0.5, 0.25, 0.25]);
    });

    it('should report months without a month-only entry', async () => {
      const file = writeFile('fine-only.csv', [
        WEIGHT_CSV_HEADER,
        '2023,2,3,0.25,0.5,0.25'
      ]);

      const { result } = await importWeightTableCSV(7, file);

      expect(result.missing_coarse_keys).toEqual(['7:M02']);
    });

    it('should accept rounded weights within a wider tolerance', async () => {
      const file = writeFile('rounded.csv', [
        WEIGHT_CSV_HEADER,
        '2023,1,,0.334,0.333,0.334'
      ]);

      const strict = await importWeightTableCSV(7, file);
      const loose = await importWeightTableCSV(7, file, { tolerance: 0.01 });

      expect(strict.result.accepted).toBe(0);
      expect(loose.result.accepted).toBe(1);
      expect(loose.entries[0].triple.sum()).toBeCloseTo(1, 12);
    });

    it('should fail for a missing file', async () => {
      await expect(importWeightTableCSV(7, path.join(tmpDir, 'absent.csv'))).rejects.toThrow('Weight file not found');
    });
  });
});
