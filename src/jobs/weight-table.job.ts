import cron from 'node-cron';
import Config from '@/config/index';
import { getErrorMessage } from '@/core/errors';
import { findPrecipitationObservations, listCellIds } from '@/database/timeseries.repository';
import { replaceHourlyTotals } from '@/database/hourly-total.repository';
import { replaceCellWeights } from '@/database/weight-table.repository';
import { aggregateHourly } from '@/services/hourly-aggregator.service';
import { buildWeightTable } from '@/services/weight-table-builder.service';
import { WeightBuildResult } from '@/types/run.types';
import { runExclusive } from '@/jobs/job-guard';
import { getBlockWindow } from '@/utils/time-window.utils';
import { logger } from '@/utils/logger';

export interface WeightRefreshResult {
  cells_processed: number;
  cells_skipped: number;
  hourly_totals_written: number;
  triples_written: number;
  builds: WeightBuildResult[];
  errors: Array<{ cell_id: number; error: string }>;
  processing_time_ms: number;
}

/**
 * Rebuild hourly totals and weight triples for every cell with observed
 * history (or only `cellIds`). One failing cell does not stop the others.
 */
export async function refreshWeightTables(cellIds?: number[]): Promise<WeightRefreshResult> {
  const startTime = Date.now();
  const result: WeightRefreshResult = {
    cells_processed: 0,
    cells_skipped: 0,
    hourly_totals_written: 0,
    triples_written: 0,
    builds: [],
    errors: [],
    processing_time_ms: 0
  };

  const cells = cellIds ?? await listCellIds('observed');
  logger.info(`Refreshing weight tables for ${cells.length} cells`, {
    granularity: Config.DISAGGREGATION.GRANULARITY,
    missing_hour_policy: Config.AGGREGATION.MISSING_HOUR_POLICY
  });

  for (const cellId of cells) {
    try {
      const observations = await findPrecipitationObservations(cellId);
      if (observations.length === 0) {
        result.cells_skipped++;
        logger.warn(`No observations for cell ${cellId}, skipping`);
        continue;
      }

      // Observations come back oldest first; cover whole blocks at both ends
      const from = getBlockWindow(observations[0].timestamp).start;
      const to = getBlockWindow(observations[observations.length - 1].timestamp).end;

      const aggregation = aggregateHourly(cellId, observations, from, to, {
        policy: Config.AGGREGATION.MISSING_HOUR_POLICY,
        minObservationsPerHour: Config.AGGREGATION.MIN_OBSERVATIONS_PER_HOUR,
        maxObservationMm: Config.AGGREGATION.MAX_OBSERVATION_MM
      });
      result.hourly_totals_written += await replaceHourlyTotals(cellId, aggregation.totals);

      const { entries, result: build } = buildWeightTable(cellId, aggregation.totals, {
        granularity: Config.DISAGGREGATION.GRANULARITY
      });
      result.triples_written += await replaceCellWeights(cellId, entries, Config.DISAGGREGATION.GRANULARITY);
      result.builds.push(build);
      result.cells_processed++;

    } catch (error) {
      const errorMessage = getErrorMessage(error);
      result.errors.push({ cell_id: cellId, error: errorMessage });
      logger.error(`Weight refresh failed for cell ${cellId}:`, { error: errorMessage });
    }
  }

  result.processing_time_ms = Date.now() - startTime;

  logger.notify(`Weight tables refreshed: ${result.cells_processed} cells, ${result.triples_written} triples`, {
    skipped: result.cells_skipped,
    failed: result.errors.length,
    hourly_totals: result.hourly_totals_written,
    processing_time_ms: result.processing_time_ms
  });

  return result;
}

export function startWeightTableJob(): void {
  const schedule = Config.CRON.WEIGHT_REFRESH;

  cron.schedule(schedule, async () => {
    logger.info('Weight table refresh cron job triggered.');

    try {
      await runExclusive('Weight table refresh', async () => {
        await refreshWeightTables();
      });
    } catch (error) {
      logger.error('Weight table refresh cron job failed unexpectedly.', {
        error: getErrorMessage(error),
      });
    }
  });

  logger.info(`Weight table refresh cron job scheduled: ${schedule}`);
}
