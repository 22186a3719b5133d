import type { ColumnType } from 'kysely';
import type { EntitySide, EntityType, KillmailStatus } from '@killtrack/shared';

/** `bigint` columns: pg hands them back as strings. */
type BigIntColumn = ColumnType<string | number, number, number>;

type CreatedAtColumn = ColumnType<Date, Date | undefined, never>;

export interface AccountsTable {
  characterId: BigIntColumn;
  accessToken: string;
  refreshToken: string;
  expiresAt: ColumnType<Date, Date, Date>;
  lastFetchedAt: ColumnType<Date | null, Date | null | undefined, Date | null>;
  createdAt: CreatedAtColumn;
  updatedAt: ColumnType<Date, Date | undefined, Date>;
}

export interface KillmailsTable {
  killmailId: BigIntColumn;
  killmailHash: string;
  status: ColumnType<KillmailStatus, KillmailStatus | undefined, KillmailStatus>;
  createdAt: CreatedAtColumn;
  updatedAt: ColumnType<Date, Date | undefined, Date>;
}

export interface EntitiesTable {
  id: BigIntColumn;
  type: EntityType;
  name: ColumnType<string, string | undefined, string>;
  createdAt: CreatedAtColumn;
}

export interface KillmailEntitiesTable {
  killmailId: BigIntColumn;
  entityId: BigIntColumn;
  entityType: EntityType;
  side: EntitySide;
  createdAt: CreatedAtColumn;
}

export interface Database {
  accounts: AccountsTable;
  killmails: KillmailsTable;
  entities: EntitiesTable;
  killmailEntities: KillmailEntitiesTable;
}
