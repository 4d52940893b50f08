import fs from 'fs';
import csv from 'csv-parser';
import { MalformedTripleError, getErrorMessage } from '@/core/errors';
import { WeightTable, WeightTableEntry, formatWeightKey } from '@/core/weight-table';
import { TRIPLE_TOLERANCE, WeightTriple } from '@/core/weight-triple';
import { listMissingCoarseKeys } from '@/services/weight-table-builder.service';
import { WeightKey } from '@/types/precipitation.types';
import { logger } from '@/utils/logger';

export const WEIGHT_CSV_HEADER = 'year,month,hour_bucket,w0,w1,w2';

interface WeightRow {
  year?: string;
  month?: string;
  hour_bucket?: string;
  w0?: string;
  w1?: string;
  w2?: string;
}

export interface WeightImportResult {
  cell_id: number;
  total_rows: number;
  accepted: number;
  duplicates: number;
  rejected: Array<{ line: number; error: string }>;
  missing_coarse_keys: string[];
}

export interface WeightImportOptions {
  tolerance?: number;
}

const parseInteger = (text: string | undefined, field: string, min: number, max: number): number => {
  const value = Number((text ?? '').trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${field} must be an integer in [${min}, ${max}], got "${text ?? ''}"`);
  }
  return value;
};

const parseHourBucket = (text: string | undefined): number | null => {
  const trimmed = (text ?? '').trim();
  if (trimmed === '') {
    return null;
  }
  const bucket = parseInteger(trimmed, 'hour_bucket', 0, 21);
  if (bucket % 3 !== 0) {
    throw new Error(`hour_bucket must be one of 0,3,...,21, got ${bucket}`);
  }
  return bucket;
};

const parseWeight = (text: string | undefined, field: string): number => {
  const trimmed = (text ?? '').trim();
  const value = trimmed === '' ? Number.NaN : Number(trimmed);
  if (Number.isNaN(value)) {
    throw new MalformedTripleError([], `${field} is not a number: "${text ?? ''}"`);
  }
  return value;
};

/**
 * One CSV line per (key, year). Weights are written with full double
 * precision so a re-import reproduces the same triples.
 */
export function formatWeightTableCSV(entries: readonly WeightTableEntry[]): string {
  const rows = [...entries]
    .sort((a, b) =>
      a.key.month - b.key.month ||
      (a.key.hour_bucket ?? -1) - (b.key.hour_bucket ?? -1) ||
      a.triple.source_year - b.triple.source_year
    )
    .map(({ key, triple }) => [
      triple.source_year,
      key.month,
      key.hour_bucket ?? '',
      ...triple.weights.map(w => String(w)),
    ].join(','));

  return [WEIGHT_CSV_HEADER, ...rows].join('\n') + '\n';
}

export async function exportWeightTableCSV(table: WeightTable, cellId: number, filePath: string): Promise<number> {
  const entries = table.toEntries().filter(entry => entry.key.cell_id === cellId);
  await fs.promises.writeFile(filePath, formatWeightTableCSV(entries), 'utf8');
  logger.info(`Exported ${entries.length} weight triples for cell ${cellId}`, { file: filePath });
  return entries.length;
}

/**
 * Reads a weight CSV for one cell. Rows failing validation are reported and
 * skipped; a repeated (key, year) keeps the last row.
 */
export async function importWeightTableCSV(
  cellId: number,
  filePath: string,
  options: WeightImportOptions = {}
): Promise<{ entries: WeightTableEntry[]; result: WeightImportResult }> {
  const tolerance = options.tolerance ?? TRIPLE_TOLERANCE;
  const result: WeightImportResult = {
    cell_id: cellId,
    total_rows: 0,
    accepted: 0,
    duplicates: 0,
    rejected: [],
    missing_coarse_keys: [],
  };

  if (!fs.existsSync(filePath)) {
    throw new Error(`Weight file not found: ${filePath}`);
  }

  const byId = new Map<string, WeightTableEntry>();

  await new Promise<void>((resolve, reject) => {
    fs.createReadStream(filePath)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on('data', (row: WeightRow) => {
        result.total_rows++;
        const line = result.total_rows + 1;

        try {
          const year = parseInteger(row.year, 'year', 1000, 9999);
          const key: WeightKey = {
            cell_id: cellId,
            month: parseInteger(row.month, 'month', 1, 12),
            hour_bucket: parseHourBucket(row.hour_bucket),
          };
          const weights = [parseWeight(row.w0, 'w0'), parseWeight(row.w1, 'w1'), parseWeight(row.w2, 'w2')];
          const triple = WeightTriple.fromWeights(weights, year, {}, tolerance);

          const id = `${formatWeightKey(key)}@${year}`;
          if (byId.has(id)) {
            result.duplicates++;
          }
          byId.set(id, { key, triple });
        } catch (error) {
          result.rejected.push({ line, error: getErrorMessage(error) });
        }
      })
      .on('end', () => resolve())
      .on('error', (error) => reject(error));
  });

  const entries = [...byId.values()];
  result.accepted = entries.length;
  result.missing_coarse_keys = listMissingCoarseKeys(entries);

  for (const rejected of result.rejected) {
    logger.warn(`Rejected weight row at line ${rejected.line}`, { cell_id: cellId, error: rejected.error });
  }
  if (result.missing_coarse_keys.length > 0) {
    logger.warn(`Imported weights have no month-only entry for ${result.missing_coarse_keys.length} month(s); fallback will not find them`, {
      cell_id: cellId,
      keys: result.missing_coarse_keys,
    });
  }

  logger.info(`Imported ${result.accepted} weight triples for cell ${cellId}`, {
    file: filePath,
    total_rows: result.total_rows,
    rejected: result.rejected.length,
    duplicates: result.duplicates,
  });

  return { entries, result };
}
