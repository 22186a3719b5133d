import { createLogger, type Logger } from '@killtrack/shared';
import { FETCH_KILLMAILS_JOB, REFRESH_JOB, RESOLVE_KILLMAILS_JOB, type Job } from './jobs.js';
import { QueueClosedError, type JobQueue } from './queue.js';

export const DEFAULT_REFRESH_INTERVAL_MS = 5 * 60 * 1000;
export const DEFAULT_FETCH_INTERVAL_MS = 10 * 60 * 1000;
export const DEFAULT_RESOLVE_INTERVAL_MS = 60 * 60 * 1000;

export interface SchedulerOptions {
  queue: Pick<JobQueue, 'send'>;
  refreshIntervalMs?: number;
  fetchIntervalMs?: number;
  resolveIntervalMs?: number;
  logger?: Logger;
}

interface Timer {
  job: Job;
  periodMs: number;
  dueAt: number;
}

/** Resolves true after `ms`, or false as soon as the signal aborts. */
const sleep = (ms: number, signal: AbortSignal): Promise<boolean> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timeout);
      resolve(false);
    };
    const timeout = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Emits the recurring refresh, discovery and resolution jobs from three
 * fixed-period timers. Each timer first fires one period after `run` starts;
 * ticks missed while a send was blocked are skipped.
 */
export class Scheduler {
  private readonly queue: Pick<JobQueue, 'send'>;
  private readonly periods: ReadonlyArray<[Job, number]>;
  private readonly logger: Logger;

  constructor(options: SchedulerOptions) {
    this.queue = options.queue;
    this.periods = [
      [REFRESH_JOB, options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS],
      [FETCH_KILLMAILS_JOB, options.fetchIntervalMs ?? DEFAULT_FETCH_INTERVAL_MS],
      [RESOLVE_KILLMAILS_JOB, options.resolveIntervalMs ?? DEFAULT_RESOLVE_INTERVAL_MS],
    ];
    for (const [job, periodMs] of this.periods) {
      if (!Number.isFinite(periodMs) || periodMs <= 0) {
        throw new RangeError(`Interval for ${job.kind} must be positive, got ${periodMs}`);
      }
    }
    this.logger = options.logger ?? createLogger({ serviceName: 'collector-scheduler' });
  }

  /**
   * Runs until the signal aborts. A send blocked on a full queue is withdrawn
   * on abort.
   */
  async run(signal: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    const timers: Timer[] = this.periods.map(([job, periodMs]) => ({
      job,
      periodMs,
      dueAt: startedAt + periodMs,
    }));

    this.logger.info(
      Object.fromEntries(timers.map((timer) => [timer.job.kind, timer.periodMs])),
      'Scheduler started',
    );

    while (!signal.aborted) {
      const nextDueAt = Math.min(...timers.map((timer) => timer.dueAt));
      const waitMs = nextDueAt - Date.now();
      if (waitMs > 0) {
        if (!(await sleep(waitMs, signal))) {
          break;
        }
        continue;
      }

      for (const timer of timers) {
        if (signal.aborted || timer.dueAt > Date.now()) {
          continue;
        }

        try {
          await this.queue.send(timer.job, signal);
          this.logger.debug({ job: timer.job.kind }, 'Scheduled job enqueued');
        } catch (error) {
          if (signal.aborted) {
            break;
          }
          if (error instanceof QueueClosedError) {
            this.logger.warn('Job queue closed, scheduler exiting');
            return;
          }
          this.logger.error({ err: error, job: timer.job.kind }, 'Failed to enqueue scheduled job');
        }

        const now = Date.now();
        while (timer.dueAt <= now) {
          timer.dueAt += timer.periodMs;
        }
      }
    }

    this.logger.info('Scheduler stopped');
  }
}
