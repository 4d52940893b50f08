import { connectDB, disconnectDB } from '@/database/connection';
import { startWeightTableJob } from '@/jobs/weight-table.job';
import { startDisaggregationJob } from '@/jobs/disaggregation.job';
import Config from '@/config/index';
import { logger } from '@/utils/logger';

async function startScheduler() {
  try {
    await connectDB();
    logger.info('✓ MongoDB connected');

    if (Config.DISAGGREGATION.BASE_SEED_SOURCE === 'random') {
      logger.notify(`Using random base seed ${Config.DISAGGREGATION.BASE_SEED}; pass it as BASE_SEED to reproduce this run`);
    }

    startWeightTableJob();
    logger.info('✓ Weight table refresh cron job started');

    startDisaggregationJob();
    logger.info('✓ Disaggregation cron job started');

    process.on('SIGINT', () => {
      logger.info('Shutting down gracefully...');
      disconnectDB()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          process.exit(1);
        });
    });

  } catch (error) {
    logger.error('Failed to start scheduler:', error);
    process.exit(1);
  }
}

void startScheduler();
