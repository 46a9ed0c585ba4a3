/**
 * Scheduler
 *
 * Crawls the source page and renders the digest on cron schedules
 */

import cron, { type ScheduledTask } from 'node-cron';
import { config } from './config/index.js';
import { runDigest } from './digest/index.js';
import { runCrawl } from './pipeline.js';
import { logger } from './utils/logger.js';

/**
 * Scheduler state
 */
let scheduledTasks: ScheduledTask[] = [];

export interface ScheduledJob {
  name: string;
  cronExpression: string;
  run: () => Promise<unknown>;
}

/**
 * Wrap a job with a lock so a slow run is never overlapped by the next tick
 */
export function withRunLock(name: string, run: () => Promise<unknown>): () => Promise<boolean> {
  let isRunning = false;

  return async () => {
    if (isRunning) {
      logger.warn({ job: name }, 'Job already running, skipping this execution');
      return false;
    }

    isRunning = true;
    const startTime = new Date();
    logger.info({ job: name, startTime: startTime.toISOString() }, 'Scheduled job starting');

    try {
      const result = await run();
      logger.info(
        { job: name, startTime: startTime.toISOString(), endTime: new Date().toISOString(), result },
        'Scheduled job completed'
      );
    } catch (error) {
      logger.error({ job: name, error }, 'Scheduled job failed');
    } finally {
      isRunning = false;
    }

    return true;
  };
}

export function defaultJobs(): ScheduledJob[] {
  return [
    { name: 'crawl', cronExpression: config.scheduler.crawlExpression, run: () => runCrawl() },
    { name: 'digest', cronExpression: config.scheduler.digestExpression, run: () => runDigest() },
  ];
}

/**
 * Start the scheduler
 */
export function startScheduler(jobs: ScheduledJob[] = defaultJobs()): void {
  for (const job of jobs) {
    if (!cron.validate(job.cronExpression)) {
      throw new Error(`Invalid cron expression for ${job.name}: ${job.cronExpression}`);
    }
  }

  logger.info(
    {
      jobs: jobs.map(({ name, cronExpression }) => ({ name, cronExpression })),
      timezone: config.scheduler.timezone,
    },
    'Starting scheduler'
  );

  for (const job of jobs) {
    const execute = withRunLock(job.name, job.run);
    scheduledTasks.push(
      cron.schedule(
        job.cronExpression,
        () => {
          execute().catch((error: unknown) => {
            logger.error({ job: job.name, error }, 'Job execution failed');
          });
        },
        { timezone: config.scheduler.timezone }
      )
    );
  }

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTasks.length > 0) {
    for (const task of scheduledTasks) {
      task.stop();
    }
    scheduledTasks = [];
    logger.info('Scheduler stopped');
  }
}

/**
 * Check if scheduler is running
 */
export function isSchedulerRunning(): boolean {
  return scheduledTasks.length > 0;
}
