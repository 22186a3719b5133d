import { CamelCasePlugin, Kysely, PostgresDialect } from 'kysely';
import { newDb, DataType } from 'pg-mem';
import * as initMigration from '../migrations/0001_init.js';
import * as killmailEntitiesMigration from '../migrations/0002_killmail_entities.js';
import type { DatabaseClient } from './client.js';
import type { Database } from './schema.js';

const migrations = [initMigration, killmailEntitiesMigration];

export interface InMemoryDatabase {
  db: DatabaseClient;
  destroy: () => Promise<void>;
}

/**
 * A migrated pg-mem database behind the same Kysely setup as {@link createDb}.
 */
export const createInMemoryDatabase = async (): Promise<InMemoryDatabase> => {
  const mem = newDb();
  mem.public.registerFunction({
    name: 'now',
    returns: DataType.timestamptz,
    implementation: () => new Date(),
  });

  const adapter = mem.adapters.createPg();
  const pool = new adapter.Pool();

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
    plugins: [new CamelCasePlugin()],
  });

  for (const migration of migrations) {
    await migration.up(db);
  }

  return {
    db,
    destroy: async () => {
      await db.destroy();
    },
  };
};
