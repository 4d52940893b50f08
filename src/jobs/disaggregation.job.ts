import cron from 'node-cron';
import Config from '@/config/index';
import { getErrorMessage } from '@/core/errors';
import { runDisaggregation } from '@/services/disaggregation-run.service';
import { runExclusive } from '@/jobs/job-guard';
import { logger } from '@/utils/logger';

/**
 * Re-run disaggregation over the configured horizon. A trigger that fires
 * while a run or a weight refresh is still in flight is skipped.
 */
export function startDisaggregationJob(): void {
  const schedule = Config.CRON.DISAGGREGATION;

  cron.schedule(schedule, async () => {
    logger.info('Disaggregation cron job triggered.');

    try {
      await runExclusive('Disaggregation run', async () => {
        await runDisaggregation();
      });
    } catch (error) {
      logger.error('Disaggregation cron job failed unexpectedly.', {
        error: getErrorMessage(error),
      });
    }
  });

  logger.info(`Disaggregation cron job scheduled: ${schedule}`);
}
