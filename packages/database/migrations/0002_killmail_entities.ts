import { sql, type Kysely } from 'kysely';
import type { Database } from '../src/schema.js';

export async function up(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createType('entity_side')
    .asEnum(['location', 'victim', 'attacker'])
    .execute();

  await db.schema
    .createTable('killmail_entities')
    .addColumn('killmail_id', 'bigint', (col) =>
      col.notNull().references('killmails.killmail_id').onDelete('cascade'),
    )
    .addColumn('entity_id', 'bigint', (col) => col.notNull())
    .addColumn('entity_type', sql`entity_type`, (col) => col.notNull())
    .addColumn('side', sql`entity_side`, (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('killmail_entities_pk', ['killmail_id', 'entity_id', 'entity_type', 'side'])
    .execute();

  await db.schema
    .createIndex('killmail_entities_entity_idx')
    .on('killmail_entities')
    .columns(['entity_id', 'entity_type'])
    .execute();
}

export async function down(db: Kysely<Database>): Promise<void> {
  await db.schema.dropTable('killmail_entities').ifExists().execute();
  await db.schema.dropType('entity_side').ifExists().execute();
}
