import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions } from 'pino';

export interface LoggerOptions {
  serviceName: string;
  level?: string;
  pretty?: boolean;
}

export type Logger = PinoLogger;

export function createLogger(options: LoggerOptions): Logger {
  const { serviceName, level = 'info', pretty = process.env.LOG_PRETTY === 'true' } = options;

  const pinoConfig: PinoLoggerOptions = {
    name: serviceName,
    level: process.env.LOG_LEVEL || level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino(
      pinoConfig,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }),
    );
  }

  return pino(pinoConfig);
}
