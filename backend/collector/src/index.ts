import { createEveSsoService } from '@killtrack/auth';
import { createDb } from '@killtrack/database';
import { createEsiClient } from '@killtrack/esi-client';
import { createLogger } from '@killtrack/shared';
import { createCollector } from './collector.js';
import { loadConfig } from './config.js';

export const start = async (): Promise<void> => {
  const config = loadConfig();
  const logger = createLogger({
    serviceName: 'collector',
    level: config.logLevel,
    pretty: config.logPretty,
  });

  const sso = createEveSsoService(
    {
      clientId: config.esi.clientId,
      clientSecret: config.esi.clientSecret,
      callbackUrl: config.esi.callbackUrl,
      timeoutMs: config.esi.timeoutMs,
    },
    logger.child({ component: 'auth' }),
  );
  const collector = createCollector({
    config,
    logger,
    db: createDb(),
    esi: createEsiClient({ timeoutMs: config.esi.timeoutMs }),
    sso,
  });

  const onSignal = () => {
    collector.shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await collector.start();
};

if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((error: unknown) => {
    createLogger({ serviceName: 'collector' }).error({ err: error }, 'Collector failed to start');
    process.exitCode = 1;
  });
}
