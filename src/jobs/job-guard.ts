import { logger } from '@/utils/logger';

let activeJob: string | null = null;

/**
 * Runs `task` unless another guarded job is in flight in this process. The
 * weight refresh and the disaggregation run share this guard, so a run never
 * reads weight tables while they are being rebuilt.
 *
 * Resolves to false when the trigger was skipped.
 */
export async function runExclusive(name: string, task: () => Promise<void>): Promise<boolean> {
  if (activeJob !== null) {
    logger.warn(`${name} skipped: ${activeJob} is still running.`);
    return false;
  }

  activeJob = name;
  try {
    await task();
    return true;
  } finally {
    activeJob = null;
  }
}
