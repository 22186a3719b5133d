import { isSentinelEntity, type Entity } from '@killtrack/shared';
import type { DatabaseClient } from '../client.js';
import type { EntityStore } from '../types.js';
import { toCount, withPersistence } from './utils.js';

export class EntityRepository implements EntityStore {
  constructor(private readonly db: DatabaseClient) {}

  /**
   * Insert-if-absent on (id, type). Names of stored entities are never
   * overwritten, and the sentinel id is never written.
   */
  async insertIfAbsent(entity: Entity): Promise<number> {
    if (isSentinelEntity(entity)) {
      return 0;
    }

    return withPersistence('insertEntityIfAbsent', async () => {
      const result = await this.db
        .insertInto('entities')
        .values({ id: entity.id, type: entity.type, name: entity.name, createdAt: new Date() })
        .onConflict((oc) => oc.columns(['id', 'type']).doNothing())
        .executeTakeFirst();

      return toCount(result.numInsertedOrUpdatedRows);
    });
  }
}
