import 'dotenv/config';
import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { FileMigrationProvider, Migrator } from 'kysely';
import { createLogger } from '@killtrack/shared';
import { createDb } from '../src/client.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const migrationsDir = path.resolve(__dirname, '../migrations');
const logger = createLogger({ serviceName: 'migrate' });

async function migrate() {
  const db = createDb();

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      migrationFolder: migrationsDir,
    }),
  });

  const direction = process.argv[2] === 'down' ? 'down' : 'latest';
  const { error, results } =
    direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();

  results?.forEach((result) => {
    if (result.status === 'Success') {
      logger.info({ migration: result.migrationName, direction }, 'Migration executed');
    } else if (result.status === 'Error') {
      logger.error({ migration: result.migrationName, direction }, 'Migration failed');
    }
  });

  await db.destroy();

  if (error) {
    logger.error({ err: error }, 'Migration run failed');
    process.exitCode = 1;
  }
}

migrate().catch((error: unknown) => {
  logger.error({ err: error }, 'Migration run crashed');
  process.exitCode = 1;
});
