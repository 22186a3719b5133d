export { createDb, createPool } from './client.js';
export type { DatabaseClient } from './client.js';
export { loadDatabaseConfig } from './env.js';
export type { DatabaseConfig, DatabaseEnv } from './env.js';
export { PersistenceError } from './errors.js';
export type {
  Database,
  AccountsTable,
  KillmailsTable,
  EntitiesTable,
  KillmailEntitiesTable,
} from './schema.js';
export * from './types.js';
export { AccountRepository } from './repositories/account-repository.js';
export { KillmailRepository } from './repositories/killmail-repository.js';
export { EntityRepository } from './repositories/entity-repository.js';
export { KillmailEntityRepository } from './repositories/killmail-entity-repository.js';
export { withPersistence } from './repositories/utils.js';
