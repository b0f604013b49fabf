import cron from 'node-cron';
import type { AppConfig } from '../config/env';
import type { Services } from '../services';
import { type Clock, systemClock } from '../utils/clock';
import { describeError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import { runDrawingLifecycle } from './drawingJobs';
import { runFulfillmentJob } from './fulfillmentJobs';

export interface GuardedJob<T> {
  readonly name: string;
  /** Resolves to null when skipped or failed. */
  run(): Promise<T | null>;
  isRunning(): boolean;
}

/** Wraps a job so a tick that fires while the previous run is still going is skipped. */
export const guardJob = <T>(
  name: string,
  task: (now: Date) => Promise<T>,
  logger: AppLogger,
  clock: Clock = systemClock
): GuardedJob<T> => {
  let running = false;

  return {
    name,
    isRunning: () => running,
    async run() {
      if (running) {
        logger.warn('job.skipped', { job: name, reason: 'previous run still in progress' });
        return null;
      }
      running = true;
      try {
        return await task(clock());
      } catch (error) {
        logger.error('job.failed', { job: name, error: describeError(error) });
        return null;
      } finally {
        running = false;
      }
    },
  };
};

export interface SchedulerHandle {
  jobs: GuardedJob<unknown>[];
  stop(): void;
}

export const startScheduler = (
  services: Services,
  config: AppConfig['scheduler'],
  clock: Clock = systemClock
): SchedulerHandle => {
  const { logger } = services;
  const plan: { expression: string; job: GuardedJob<unknown> }[] = [
    {
      expression: config.drawingCron,
      job: guardJob('drawing_lifecycle', (now) => runDrawingLifecycle(services, now), logger, clock),
    },
    {
      expression: config.fulfillmentCron,
      job: guardJob('fulfillment', (now) => runFulfillmentJob(services, now), logger, clock),
    },
  ];

  const sync = services.sync;
  if (sync) {
    plan.push({
      expression: config.syncCron,
      job: guardJob('activity_sync', (now) => sync.syncAll(now), logger, clock),
    });
  } else {
    // syncCron only applies once tracker providers are registered at startup
    logger.info('job.not_scheduled', { job: 'activity_sync', reason: 'no tracker providers registered' });
  }

  const tasks = plan.map(({ expression, job }) => {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for ${job.name}: ${expression}`);
    }
    const task = cron.schedule(expression, async () => {
      await job.run();
    });
    logger.info('job.scheduled', { job: job.name, cron: expression });
    return task;
  });

  return {
    jobs: plan.map(({ job }) => job),
    stop: () => {
      for (const task of tasks) {
        task.stop();
      }
    },
  };
};
