/**
 * Remove terminal jobs older than JOB_RETENTION_DAYS.
 */

import { config, logger } from '@docintake/shared';
import { createPool, purgeExpiredJobs } from './lib/db';

const pool = createPool(config.databaseUrl);

purgeExpiredJobs(pool, config.jobRetentionDays)
  .then((count) => {
    logger.info('Retention purge finished', { count });
    return pool.end();
  })
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
