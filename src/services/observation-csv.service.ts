import fs from 'fs';
import csv from 'csv-parser';
import moment from 'moment';
import Config from '@/config/index';
import { createFutureBlock, createObservation } from '@/core/records';
import { getErrorMessage } from '@/core/errors';
import { upsertSeriesValues } from '@/database/timeseries.repository';
import { logger } from '@/utils/logger';

type LoadableSeries = 'observed' | 'projected_3h';

interface PrecipitationRow {
  time?: string;
  pr?: string;
}

interface ParsedValue {
  timestamp: Date;
  cell_id: number;
  variable: 'precipitation';
  value: number;
}

export interface PrecipitationCSVContent {
  total_rows: number;
  records: ParsedValue[];
  errors: string[];
}

export interface PrecipitationLoadResult {
  success: boolean;
  cell_id: number;
  series: LoadableSeries;
  total_rows: number;
  records_written: number;
  errors: string[];
  processing_time_ms: number;
}

const TIMESTAMP_FORMATS = ['YYYY.MM.DD HH:mm', 'YYYY-MM-DD HH:mm', 'YYYY-MM-DD HH:mm:ss'];

/**
 * Parses `YYYY.MM.DD HH:MM` (gauge exports) or `YYYY-MM-DD HH:MM[:SS]` as UTC.
 * Returns null for anything else, including impossible dates.
 */
export function parseTimestamp(text: string): Date | null {
  const parsed = moment.utc(text.trim(), TIMESTAMP_FORMATS, true);
  return parsed.isValid() ? parsed.toDate() : null;
}

/**
 * Reads a semicolon separated `time;pr` file. Observed rows are only checked
 * for shape; projected rows must also be valid 3-hour blocks.
 */
export async function readPrecipitationCSV(
  csvFilePath: string,
  cellId: number,
  series: LoadableSeries
): Promise<PrecipitationCSVContent> {
  const content: PrecipitationCSVContent = { total_rows: 0, records: [], errors: [] };

  await new Promise<void>((resolve, reject) => {
    fs.createReadStream(csvFilePath)
      .pipe(csv({ separator: ';', mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on('data', (row: PrecipitationRow) => {
        content.total_rows++;
        const line = content.total_rows + 1;

        const timestamp = parseTimestamp(row.time ?? '');
        if (!timestamp) {
          content.errors.push(`Line ${line}: invalid timestamp "${row.time ?? ''}"`);
          return;
        }

        const rawValue = (row.pr ?? '').trim();
        const value = Number(rawValue);
        if (rawValue === '' || Number.isNaN(value)) {
          content.errors.push(`Line ${line}: invalid precipitation value "${row.pr ?? ''}"`);
          return;
        }

        try {
          if (series === 'projected_3h') {
            const block = createFutureBlock({ timestamp, cell_id: cellId, value });
            content.records.push({ timestamp: block.block_start, cell_id: block.cell_id, variable: 'precipitation', value: block.total_mm });
          } else {
            const observation = createObservation({ timestamp, cell_id: cellId, value, variable: 'precipitation' });
            content.records.push({ timestamp: observation.timestamp, cell_id: observation.cell_id, variable: 'precipitation', value: observation.value });
          }
        } catch (error) {
          content.errors.push(`Line ${line}: ${getErrorMessage(error)}`);
        }
      })
      .on('end', () => resolve())
      .on('error', (error) => reject(error));
  });

  return content;
}

/**
 * Load a precipitation CSV for one cell into the time-series store.
 */
export async function loadPrecipitationCSV(
  cellId: number,
  csvFilePath: string,
  series: LoadableSeries = 'observed',
  dryRun: boolean = false
): Promise<PrecipitationLoadResult> {
  const startTime = Date.now();
  const result: PrecipitationLoadResult = {
    success: false,
    cell_id: cellId,
    series,
    total_rows: 0,
    records_written: 0,
    errors: [],
    processing_time_ms: 0
  };

  try {
    if (!fs.existsSync(csvFilePath)) {
      throw new Error(`CSV file not found: ${csvFilePath}`);
    }

    logger.info(`Loading ${series} precipitation for cell ${cellId}`, { file: csvFilePath });

    const content = await readPrecipitationCSV(csvFilePath, cellId, series);
    result.total_rows = content.total_rows;
    result.errors.push(...content.errors);

    logger.info(`Parsed ${content.records.length} of ${content.total_rows} rows`, {
      cell_id: cellId,
      rejected: content.errors.length
    });

    if (!dryRun && content.records.length > 0) {
      const summary = await upsertSeriesValues(series, content.records, Config.DISAGGREGATION.WRITE_BATCH_SIZE);
      result.records_written = summary.upserted + summary.matched;
    }

    result.success = true;

  } catch (error) {
    const errorMessage = getErrorMessage(error);
    result.errors.push(errorMessage);
    logger.error(`Failed to load precipitation CSV for cell ${cellId}:`, { error: errorMessage });
  }

  result.processing_time_ms = Date.now() - startTime;
  return result;
}
