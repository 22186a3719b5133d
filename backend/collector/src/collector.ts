import type { TokenService } from '@killtrack/auth';
import {
  AccountRepository,
  EntityRepository,
  KillmailEntityRepository,
  KillmailRepository,
  type DatabaseClient,
} from '@killtrack/database';
import type { Logger } from '@killtrack/shared';
import type { CollectorConfig } from './config.js';
import { STOP_JOB } from './jobs.js';
import { Processor, type KillmailSource } from './processor.js';
import { JobQueue } from './queue.js';
import { Scheduler } from './scheduler.js';
import { buildServer } from './server.js';

export interface CollectorDependencies {
  config: CollectorConfig;
  logger: Logger;
  db: DatabaseClient;
  esi: KillmailSource;
  sso: TokenService;
}

export interface Collector {
  readonly queue: JobQueue;
  readonly server: ReturnType<typeof buildServer>;
  /** Listens, then starts the processor and scheduler. */
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export const createCollector = ({ config, logger, db, esi, sso }: CollectorDependencies): Collector => {
  const queue = new JobQueue(config.queueCapacity);
  const processor = new Processor({
    queue,
    tokens: sso,
    esi,
    accounts: new AccountRepository(db),
    killmails: new KillmailRepository(db),
    entities: new EntityRepository(db),
    killmailEntities: new KillmailEntityRepository(db),
    logger: logger.child({ component: 'processor' }),
    refreshWindowMs: config.refreshWindowMs,
    refreshAllAccounts: config.refreshAllAccounts,
  });
  const scheduler = new Scheduler({
    queue,
    refreshIntervalMs: config.refreshIntervalMs,
    fetchIntervalMs: config.fetchIntervalMs,
    resolveIntervalMs: config.resolveIntervalMs,
    logger: logger.child({ component: 'scheduler' }),
  });
  const server = buildServer({
    queue,
    tokens: sso,
    logger: logger.child({ component: 'http' }),
    secureCookies: config.secureCookies,
  });

  const abortController = new AbortController();
  let processorTask: Promise<void> | undefined;
  let schedulerTask: Promise<void> | undefined;
  let stopping: Promise<void> | undefined;

  const stop = async () => {
    abortController.abort();
    logger.info('Shutting down collector');

    try {
      await server.close();
    } catch (error) {
      logger.warn({ err: error }, 'HTTP server did not close cleanly');
    }
    await schedulerTask;
    if (processorTask) {
      if (!queue.closed) {
        await queue.send(STOP_JOB);
      }
      await processorTask;
    } else {
      queue.close();
    }
    await db.destroy();
    logger.info('Collector stopped');
  };

  const shutdown = (): Promise<void> => {
    stopping ??= stop();
    return stopping;
  };

  const start = async (): Promise<void> => {
    try {
      await server.listen({ port: config.port, host: config.host });
    } catch (error) {
      logger.error({ err: error, port: config.port, host: config.host }, 'HTTP server failed to listen');
      await shutdown();
      throw error;
    }

    processorTask = processor.run();
    schedulerTask = scheduler.run(abortController.signal);
    logger.info({ port: config.port, host: config.host }, 'Collector ready');
  };

  return { queue, server, start, shutdown };
};
