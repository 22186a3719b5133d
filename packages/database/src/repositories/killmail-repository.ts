import type { KillmailReference, KillmailStatus } from '@killtrack/shared';
import type { DatabaseClient } from '../client.js';
import { KillmailRecordSchema, type KillmailStore } from '../types.js';
import { toCount, withPersistence } from './utils.js';

export class KillmailRepository implements KillmailStore {
  constructor(private readonly db: DatabaseClient) {}

  /**
   * Record a killmail reference. A reference that already exists is left
   * untouched and 0 is returned.
   */
  async insertIfAbsent(
    killmailId: number,
    killmailHash: string,
    status: KillmailStatus = 'new',
  ): Promise<number> {
    return withPersistence('insertKillmailIfAbsent', async () => {
      const now = new Date();
      const result = await this.db
        .insertInto('killmails')
        .values({ killmailId, killmailHash, status, createdAt: now, updatedAt: now })
        .onConflict((oc) => oc.column('killmailId').doNothing())
        .executeTakeFirst();

      return toCount(result.numInsertedOrUpdatedRows);
    });
  }

  async updateStatus(killmailId: number, status: KillmailStatus): Promise<number> {
    return withPersistence('updateKillmailStatus', async () => {
      const result = await this.db
        .updateTable('killmails')
        .set({ status, updatedAt: new Date() })
        .where('killmailId', '=', killmailId)
        .executeTakeFirst();

      return toCount(result.numUpdatedRows);
    });
  }

  async listPending(): Promise<KillmailReference[]> {
    return withPersistence('queryPendingKillmails', async () => {
      const rows = await this.db
        .selectFrom('killmails')
        .select(['killmailId', 'killmailHash', 'status'])
        .where('status', '=', 'new')
        .orderBy('killmailId', 'asc')
        .execute();

      return rows.map((row) => KillmailRecordSchema.parse(row));
    });
  }

  async countExisting(killmailIds: readonly number[]): Promise<number> {
    if (killmailIds.length === 0) {
      return 0;
    }

    return withPersistence('queryKillmailsById', async () => {
      const rows = await this.db
        .selectFrom('killmails')
        .select('killmailId')
        .where('killmailId', 'in', [...killmailIds])
        .execute();

      return rows.length;
    });
  }
}
