import { CamelCasePlugin, Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { Pool } from 'pg';
import { loadDatabaseConfig, type DatabaseConfig } from './env.js';
import type { Database } from './schema.js';

export type DatabaseClient = Kysely<Database>;

const DEFAULT_MAX_CONNECTIONS = 20;

export const createPool = (config: DatabaseConfig): Pool =>
  config.connectionString
    ? new pg.Pool({
        connectionString: config.connectionString,
        ssl: config.ssl,
        max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
      })
    : new pg.Pool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl,
        max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
      });

export const createDb = (config: DatabaseConfig = loadDatabaseConfig()): DatabaseClient =>
  new Kysely<Database>({
    dialect: new PostgresDialect({ pool: createPool(config) }),
    plugins: [new CamelCasePlugin()],
  });
