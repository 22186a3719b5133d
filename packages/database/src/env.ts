import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_HOST: z.string().optional(),
  POSTGRES_PORT: z.preprocess(
    (val) => (val === '' || val === undefined ? undefined : val),
    z.coerce.number().int().optional(),
  ),
  POSTGRES_DB: z.string().optional(),
  POSTGRES_USER: z.string().optional(),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_SSL: z
    .enum(['true', 'false'])
    .optional()
    .transform((val) => (val === 'true' ? true : val === 'false' ? false : undefined)),
  DATABASE_MAX_CONNECTIONS: z.preprocess(
    (val) => (val === '' || val === undefined ? undefined : val),
    z.coerce.number().int().positive().optional(),
  ),
});

export type DatabaseEnv = z.infer<typeof DatabaseEnvSchema>;

export interface DatabaseConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
  maxConnections?: number;
}

export const loadDatabaseConfig = (env: NodeJS.ProcessEnv = process.env): DatabaseConfig => {
  const parsed = DatabaseEnvSchema.parse(env);
  const maxConnections = parsed.DATABASE_MAX_CONNECTIONS;

  if (parsed.DATABASE_URL) {
    return { connectionString: parsed.DATABASE_URL, ssl: parsed.POSTGRES_SSL, maxConnections };
  }

  const { POSTGRES_HOST: host, POSTGRES_DB: database, POSTGRES_USER: user } = parsed;
  if (!host || !database || !user) {
    const missing = Object.entries({ POSTGRES_HOST: host, POSTGRES_DB: database, POSTGRES_USER: user })
      .filter(([, value]) => !value)
      .map(([key]) => key);
    throw new Error(`Missing required database configuration: ${missing.join(', ')}`);
  }

  return {
    host,
    port: parsed.POSTGRES_PORT ?? 5432,
    database,
    user,
    password: parsed.POSTGRES_PASSWORD,
    ssl: parsed.POSTGRES_SSL,
    maxConnections,
  };
};
