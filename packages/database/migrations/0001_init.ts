import { sql, type Kysely } from 'kysely';
import type { Database } from '../src/schema.js';

/**
 * Accounts, killmail references and the entities extracted from resolved
 * killmails.
 */
export async function up(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createType('killmail_status')
    .asEnum(['new', 'resolved', 'failed'])
    .execute();

  await db.schema
    .createType('entity_type')
    .asEnum(['solar_system', 'character', 'corporation', 'alliance', 'ship_type', 'weapon_type'])
    .execute();

  await db.schema
    .createTable('accounts')
    .addColumn('character_id', 'bigint', (col) => col.primaryKey())
    .addColumn('access_token', 'text', (col) => col.notNull())
    .addColumn('refresh_token', 'text', (col) => col.notNull())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('last_fetched_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('accounts_expires_at_idx')
    .on('accounts')
    .column('expires_at')
    .execute();

  await db.schema
    .createTable('killmails')
    .addColumn('killmail_id', 'bigint', (col) => col.primaryKey())
    .addColumn('killmail_hash', 'text', (col) => col.notNull())
    .addColumn('status', sql`killmail_status`, (col) => col.notNull().defaultTo('new'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('killmails_status_idx')
    .on('killmails')
    .column('status')
    .execute();

  await db.schema
    .createTable('entities')
    .addColumn('id', 'bigint', (col) => col.notNull())
    .addColumn('type', sql`entity_type`, (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('entities_pk', ['id', 'type'])
    .execute();
}

export async function down(db: Kysely<Database>): Promise<void> {
  await db.schema.dropTable('entities').ifExists().execute();
  await db.schema.dropTable('killmails').ifExists().execute();
  await db.schema.dropTable('accounts').ifExists().execute();
  await db.schema.dropType('entity_type').ifExists().execute();
  await db.schema.dropType('killmail_status').ifExists().execute();
}
