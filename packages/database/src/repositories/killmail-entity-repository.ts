import type { KillmailEntityLink } from '@killtrack/shared';
import type { DatabaseClient } from '../client.js';
import { KillmailEntityRecordSchema, type KillmailEntityStore } from '../types.js';
import { toCount, withPersistence } from './utils.js';

export class KillmailEntityRepository implements KillmailEntityStore {
  constructor(private readonly db: DatabaseClient) {}

  /**
   * Link a killmail to an entity on one side. Repeated links are no-ops. The
   * killmail must already be stored.
   */
  async insertIfAbsent(link: KillmailEntityLink): Promise<number> {
    return withPersistence('insertKillmailEntityIfAbsent', async () => {
      const result = await this.db
        .insertInto('killmailEntities')
        .values({
          killmailId: link.killmailId,
          entityId: link.entityId,
          entityType: link.entityType,
          side: link.side,
          createdAt: new Date(),
        })
        .onConflict((oc) =>
          oc.columns(['killmailId', 'entityId', 'entityType', 'side']).doNothing(),
        )
        .executeTakeFirst();

      return toCount(result.numInsertedOrUpdatedRows);
    });
  }

  async listForKillmail(killmailId: number): Promise<KillmailEntityLink[]> {
    return withPersistence('queryKillmailEntities', async () => {
      const rows = await this.db
        .selectFrom('killmailEntities')
        .select(['killmailId', 'entityId', 'entityType', 'side'])
        .where('killmailId', '=', killmailId)
        .orderBy('entityId', 'asc')
        .execute();

      return rows.map((row) => KillmailEntityRecordSchema.parse(row));
    });
  }
}
