/**
 * Expired Jobs Cleanup Cron Job
 * Removes jobs (and their files) that were never fetched.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { expireJobs } from '../../services/business/downloadService.js';
import { JOB_TTL_HOURS } from '../../config/env.js';

/**
 * Starts the cleanup cron job.
 * Runs every hour and removes jobs older than JOB_TTL_HOURS.
 */
export function startExpiredJobsCleanup(): ScheduledTask {
  // Schedule: "0 * * * *" = At minute 0 of every hour
  const task = cron.schedule('0 * * * *', async () => {
    console.log('[Cleanup Job] Starting...');
    try {
      const removed = await expireJobs(JOB_TTL_HOURS);
      console.log(`[Cleanup Job] ✓ Removed ${removed} expired jobs`);
    } catch (error) {
      console.error('[Cleanup Job] ✗ Failed:', error);
    }
  });

  console.log(`[Cleanup Job] Scheduled (every hour, TTL ${JOB_TTL_HOURS}h)`);
  return task;
}
