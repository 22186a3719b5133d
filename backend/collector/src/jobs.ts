import type { Account, Entity, KillmailEntityLink } from '@killtrack/shared';

/**
 * Everything the processor knows how to do. `stop` ends the processing loop.
 */
export type Job =
  | { kind: 'refresh' }
  | { kind: 'fetch-killmails' }
  | { kind: 'resolve-killmails' }
  | { kind: 'save-account'; account: Account }
  | { kind: 'save-killmail-reference'; killmailId: number; killmailHash: string }
  | { kind: 'save-entity'; entity: Entity }
  | { kind: 'save-killmail-entity'; link: KillmailEntityLink }
  | {
      kind: 'mark-account-fetched';
      characterId: number;
      fetchedAt: Date;
      /** References from the listing; the mark waits until all are stored. */
      killmailIds: number[];
    }
  | { kind: 'stop' };

export type JobKind = Job['kind'];

export const REFRESH_JOB: Job = { kind: 'refresh' };
export const FETCH_KILLMAILS_JOB: Job = { kind: 'fetch-killmails' };
export const RESOLVE_KILLMAILS_JOB: Job = { kind: 'resolve-killmails' };
export const STOP_JOB: Job = { kind: 'stop' };

export const assertNever = (value: never): never => {
  throw new Error(`Unhandled job: ${JSON.stringify(value)}`);
};
