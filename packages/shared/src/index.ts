export {
  ENTITY_SIDES,
  ENTITY_TYPES,
  KILLMAIL_STATUSES,
  SENTINEL_ENTITY_ID,
  isSentinelEntity,
  type Account,
  type Entity,
  type EntitySide,
  type EntityType,
  type KillmailEntityLink,
  type KillmailReference,
  type KillmailStatus,
} from './domain.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';
