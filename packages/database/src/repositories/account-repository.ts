import type { Account } from '@killtrack/shared';
import type { DatabaseClient } from '../client.js';
import {
  AccountRecordSchema,
  type AccountListOptions,
  type AccountRecord,
  type AccountStore,
} from '../types.js';
import { toCount, withPersistence } from './utils.js';

export class AccountRepository implements AccountStore {
  constructor(private readonly db: DatabaseClient) {}

  /**
   * Insert the account, or replace its tokens and expiry when the character
   * is already known.
   */
  async upsert(account: Account): Promise<number> {
    return withPersistence('upsertAccount', async () => {
      const now = new Date();
      const result = await this.db
        .insertInto('accounts')
        .values({
          characterId: account.characterId,
          accessToken: account.accessToken,
          refreshToken: account.refreshToken,
          expiresAt: account.expiresAt,
          createdAt: now,
          updatedAt: now,
        })
        .onConflict((oc) =>
          oc.column('characterId').doUpdateSet({
            accessToken: account.accessToken,
            refreshToken: account.refreshToken,
            expiresAt: account.expiresAt,
            updatedAt: now,
          }),
        )
        .executeTakeFirst();

      return toCount(result.numInsertedOrUpdatedRows);
    });
  }

  async list(options: AccountListOptions = {}): Promise<AccountRecord[]> {
    return withPersistence('queryAccounts', async () => {
      let query = this.db.selectFrom('accounts').selectAll();
      if (options.expiresBefore) {
        query = query.where('expiresAt', '<', options.expiresBefore);
      }

      const rows = await query.orderBy('characterId', 'asc').execute();
      return rows.map((row) => AccountRecordSchema.parse(row));
    });
  }

  async markFetched(characterId: number, fetchedAt: Date): Promise<number> {
    return withPersistence('markAccountFetched', async () => {
      const result = await this.db
        .updateTable('accounts')
        .set({ lastFetchedAt: fetchedAt })
        .where('characterId', '=', characterId)
        .executeTakeFirst();

      return toCount(result.numUpdatedRows);
    });
  }
}
