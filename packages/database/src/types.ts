import { z } from 'zod';
import {
  ENTITY_SIDES,
  ENTITY_TYPES,
  KILLMAIL_STATUSES,
  type Account,
  type Entity,
  type KillmailEntityLink,
  type KillmailReference,
  type KillmailStatus,
} from '@killtrack/shared';

const entityId = z.coerce.number().int().nonnegative();

export const KillmailStatusSchema = z.enum(KILLMAIL_STATUSES);
export const EntityTypeSchema = z.enum(ENTITY_TYPES);
export const EntitySideSchema = z.enum(ENTITY_SIDES);

export const AccountRecordSchema = z.object({
  characterId: entityId,
  accessToken: z.string(),
  refreshToken: z.string(),
  expiresAt: z.coerce.date(),
  lastFetchedAt: z.coerce.date().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type AccountRecord = z.infer<typeof AccountRecordSchema>;

export const KillmailRecordSchema = z.object({
  killmailId: entityId,
  killmailHash: z.string(),
  status: KillmailStatusSchema,
});

export const EntityRecordSchema = z.object({
  id: entityId,
  name: z.string(),
  type: EntityTypeSchema,
});

export const KillmailEntityRecordSchema = z.object({
  killmailId: entityId,
  entityId,
  entityType: EntityTypeSchema,
  side: EntitySideSchema,
});

export interface AccountListOptions {
  /** Only accounts whose token expires strictly before this instant. */
  expiresBefore?: Date;
}

export interface AccountStore {
  upsert(account: Account): Promise<number>;
  list(options?: AccountListOptions): Promise<AccountRecord[]>;
  markFetched(characterId: number, fetchedAt: Date): Promise<number>;
}

export interface KillmailStore {
  insertIfAbsent(killmailId: number, killmailHash: string, status?: KillmailStatus): Promise<number>;
  updateStatus(killmailId: number, status: KillmailStatus): Promise<number>;
  listPending(): Promise<KillmailReference[]>;
  /** How many of the given killmail ids are stored. */
  countExisting(killmailIds: readonly number[]): Promise<number>;
}

export interface EntityStore {
  insertIfAbsent(entity: Entity): Promise<number>;
}

export interface KillmailEntityStore {
  insertIfAbsent(link: KillmailEntityLink): Promise<number>;
  listForKillmail(killmailId: number): Promise<KillmailEntityLink[]>;
}
