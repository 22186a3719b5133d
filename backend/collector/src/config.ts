import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_FETCH_INTERVAL_MS,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_RESOLVE_INTERVAL_MS,
} from './scheduler.js';
import { DEFAULT_REFRESH_WINDOW_MS } from './processor.js';

loadEnv();

const interval = (defaultMs: number) => z.number().int().positive().default(defaultMs);

const ConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(3000),
  esi: z.object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    callbackUrl: z.string().url(),
    timeoutMs: interval(10_000),
  }),
  queueCapacity: z.number().int().positive().default(100),
  refreshIntervalMs: interval(DEFAULT_REFRESH_INTERVAL_MS),
  fetchIntervalMs: interval(DEFAULT_FETCH_INTERVAL_MS),
  resolveIntervalMs: interval(DEFAULT_RESOLVE_INTERVAL_MS),
  refreshWindowMs: z.number().int().nonnegative().default(DEFAULT_REFRESH_WINDOW_MS),
  refreshAllAccounts: z.boolean().default(false),
  secureCookies: z.boolean().default(false),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  logPretty: z.boolean().default(false),
});

export type CollectorConfig = z.infer<typeof ConfigSchema>;

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : Number(value);

const toBoolean = (value: string | undefined): boolean | undefined =>
  value === undefined || value === '' ? undefined : value === 'true';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): CollectorConfig =>
  ConfigSchema.parse({
    host: env.HOST,
    port: toNumber(env.PORT),
    esi: {
      clientId: env.ESI_CLIENT_ID,
      clientSecret: env.ESI_CLIENT_SECRET,
      callbackUrl: env.ESI_CALLBACK_URL,
      timeoutMs: toNumber(env.ESI_TIMEOUT_MS),
    },
    queueCapacity: toNumber(env.QUEUE_CAPACITY),
    refreshIntervalMs: toNumber(env.REFRESH_INTERVAL_MS),
    fetchIntervalMs: toNumber(env.FETCH_INTERVAL_MS),
    resolveIntervalMs: toNumber(env.RESOLVE_INTERVAL_MS),
    refreshWindowMs: toNumber(env.REFRESH_WINDOW_MS),
    refreshAllAccounts: toBoolean(env.REFRESH_ALL_ACCOUNTS),
    secureCookies: toBoolean(env.SECURE_COOKIES),
    logLevel: env.LOG_LEVEL,
    logPretty: toBoolean(env.LOG_PRETTY),
  });
