export const ENTITY_TYPES = [
  'solar_system',
  'character',
  'corporation',
  'alliance',
  'ship_type',
  'weapon_type',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const KILLMAIL_STATUSES = ['new', 'resolved', 'failed'] as const;

export type KillmailStatus = (typeof KILLMAIL_STATUSES)[number];

/** Where in a killmail an entity appears. */
export const ENTITY_SIDES = ['location', 'victim', 'attacker'] as const;

export type EntitySide = (typeof ENTITY_SIDES)[number];

/** Marks a field that was absent from a killmail payload. Never persisted. */
export const SENTINEL_ENTITY_ID = 0;

/**
 * An authorized character and its current SSO token pair.
 */
export interface Account {
  characterId: number;
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  createdAt?: Date;
  updatedAt?: Date;
  lastFetchedAt?: Date | null;
}

export interface KillmailReference {
  killmailId: number;
  killmailHash: string;
  status: KillmailStatus;
}

export interface Entity {
  id: number;
  name: string;
  type: EntityType;
}

/**
 * Ties a resolved killmail to an entity it references. One link per distinct
 * (killmail, entity, side); an entity that appears on both sides gets two.
 */
export interface KillmailEntityLink {
  killmailId: number;
  entityId: number;
  entityType: EntityType;
  side: EntitySide;
}

export const isSentinelEntity = (entity: Pick<Entity, 'id'>): boolean =>
  entity.id === SENTINEL_ENTITY_ID;
