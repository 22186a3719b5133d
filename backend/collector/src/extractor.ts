import { z } from 'zod';
import {
  SENTINEL_ENTITY_ID,
  isSentinelEntity,
  type Entity,
  type EntitySide,
  type EntityType,
  type Logger,
} from '@killtrack/shared';

type JsonObject = Record<string, unknown>;

export interface SidedEntity {
  entity: Entity;
  side: EntitySide;
}

const EntityIdSchema = z.number().int().nonnegative();

const VICTIM_FIELDS: ReadonlyArray<[field: string, type: EntityType]> = [
  ['character_id', 'character'],
  ['corporation_id', 'corporation'],
  ['alliance_id', 'alliance'],
  ['weapon_type_id', 'weapon_type'],
  ['ship_type_id', 'ship_type'],
];

const ATTACKER_FIELDS: ReadonlyArray<[field: string, type: EntityType]> = [
  ['character_id', 'character'],
  ['corporation_id', 'corporation'],
  ['alliance_id', 'alliance'],
  ['ship_type_id', 'ship_type'],
];

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readId = (source: JsonObject, field: string): number | undefined => {
  const parsed = EntityIdSchema.safeParse(source[field]);
  return parsed.success ? parsed.data : undefined;
};

const collect = (
  source: JsonObject,
  fields: ReadonlyArray<[field: string, type: EntityType]>,
  side: EntitySide,
  into: SidedEntity[],
): void => {
  for (const [field, type] of fields) {
    const id = readId(source, field);
    if (id !== undefined) {
      into.push({ entity: { id, name: '', type }, side });
    }
  }
};

/**
 * Lists the entities a killmail document references together with the side
 * they appear on: the solar system, the victim's fields, then each
 * attacker's fields in array order.
 *
 * Missing or malformed fields are skipped. Nothing is deduplicated, and no
 * entity with the sentinel id is returned.
 */
export const extractSidedEntities = (detail: unknown, logger?: Logger): SidedEntity[] => {
  const killmail = isObject(detail) ? detail : {};
  const found: SidedEntity[] = [];

  const solarSystemId = readId(killmail, 'solar_system_id');
  if (solarSystemId === undefined) {
    logger?.warn(
      { killmailId: readId(killmail, 'killmail_id') },
      'Killmail has no solar_system_id',
    );
  }
  found.push({
    entity: { id: solarSystemId ?? SENTINEL_ENTITY_ID, name: '', type: 'solar_system' },
    side: 'location',
  });

  if (isObject(killmail.victim)) {
    collect(killmail.victim, VICTIM_FIELDS, 'victim', found);
  }

  const attackers = Array.isArray(killmail.attackers) ? killmail.attackers : [];
  for (const attacker of attackers) {
    if (isObject(attacker)) {
      collect(attacker, ATTACKER_FIELDS, 'attacker', found);
    }
  }

  return found.filter(({ entity }) => !isSentinelEntity(entity));
};

export const extractEntities = (detail: unknown, logger?: Logger): Entity[] =>
  extractSidedEntities(detail, logger).map(({ entity }) => entity);
