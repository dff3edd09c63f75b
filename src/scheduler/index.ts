import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import type { SessionCleanupJob } from './SessionCleanupJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleSessionCleanup(job: SessionCleanupJob, cronExpression: string, timezone: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid SESSION_CLEANUP_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Scheduling session cleanup job');

  return cron.schedule(
    cronExpression,
    () => {
      try {
        job.run();
      } catch (error) {
        logger.error({ error }, 'Session cleanup job failed');
      }
    },
    { timezone }
  );
}
