import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { TokenService } from '@killtrack/auth';
import type {
  AccountStore,
  EntityStore,
  KillmailEntityStore,
  KillmailStore,
} from '@killtrack/database';
import type { KillmailDocument, RecentKillmailsResult } from '@killtrack/esi-client';
import { createLogger, type KillmailEntityLink, type Logger } from '@killtrack/shared';
import { extractSidedEntities } from './extractor.js';
import { assertNever, type Job } from './jobs.js';
import { QueueClosedError, type JobQueue } from './queue.js';

const tracer = trace.getTracer('killtrack.collector.processor');

export const DEFAULT_REFRESH_WINDOW_MS = 10 * 60 * 1000;

/** The ESI calls the processor makes; satisfied by `EsiClient`. */
export interface KillmailSource {
  getRecentKillmails(
    characterId: number,
    accessToken: string,
    ifModifiedSince?: Date | null,
  ): Promise<RecentKillmailsResult>;
  getKillmail(killmailId: number, killmailHash: string): Promise<KillmailDocument>;
}

export interface ProcessorOptions {
  queue: JobQueue;
  tokens: Pick<TokenService, 'refresh'>;
  esi: KillmailSource;
  accounts: AccountStore;
  killmails: KillmailStore;
  entities: EntityStore;
  killmailEntities: KillmailEntityStore;
  logger?: Logger;
  /** Refresh accounts whose token expires within this window. */
  refreshWindowMs?: number;
  /** Refresh every account regardless of expiry. */
  refreshAllAccounts?: boolean;
  now?: () => Date;
}

/**
 * Single consumer of the job queue. Jobs run one at a time in queue order; a
 * failing job is logged and never stops the loop.
 */
export class Processor {
  private readonly queue: JobQueue;
  private readonly tokens: Pick<TokenService, 'refresh'>;
  private readonly esi: KillmailSource;
  private readonly accounts: AccountStore;
  private readonly killmails: KillmailStore;
  private readonly entities: EntityStore;
  private readonly killmailEntities: KillmailEntityStore;
  private readonly logger: Logger;
  private readonly refreshWindowMs: number;
  private readonly refreshAllAccounts: boolean;
  private readonly now: () => Date;
  private readonly followUps = new Set<Promise<void>>();

  constructor(options: ProcessorOptions) {
    this.queue = options.queue;
    this.tokens = options.tokens;
    this.esi = options.esi;
    this.accounts = options.accounts;
    this.killmails = options.killmails;
    this.entities = options.entities;
    this.killmailEntities = options.killmailEntities;
    this.logger = options.logger ?? createLogger({ serviceName: 'collector-processor' });
    this.refreshWindowMs = options.refreshWindowMs ?? DEFAULT_REFRESH_WINDOW_MS;
    this.refreshAllAccounts = options.refreshAllAccounts ?? false;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Consume jobs until a `stop` job arrives or the queue is closed. On `stop`
   * the queue is closed and whatever is still buffered is dropped.
   */
  async run(): Promise<void> {
    this.logger.info('Processor started');

    for (;;) {
      let job: Job;
      try {
        job = await this.queue.receive();
      } catch (error) {
        if (error instanceof QueueClosedError) {
          this.logger.info('Job queue closed, processor exiting');
          await this.drain();
          return;
        }
        throw error;
      }

      if (job.kind === 'stop') {
        const dropped = this.queue.close();
        await this.drain();
        this.logger.info({ dropped }, 'Processor stopped');
        return;
      }

      await this.process(job);
    }
  }

  /**
   * Handle one job. Never rejects.
   */
  async process(job: Job): Promise<void> {
    await tracer.startActiveSpan(`job.${job.kind}`, async (span) => {
      try {
        await this.handle(job);
        span.setStatus({ code: SpanStatusCode.OK });
      } catch (error) {
        this.logger.error({ err: error, job: job.kind }, 'Job failed');
        if (error instanceof Error) {
          span.recordException(error);
        }
        span.setStatus({ code: SpanStatusCode.ERROR });
      } finally {
        span.end();
      }
    });
  }

  /**
   * Wait for follow-up jobs that are still waiting for a queue slot.
   */
  async drain(): Promise<void> {
    while (this.followUps.size > 0) {
      await Promise.all([...this.followUps]);
    }
  }

  private async handle(job: Job): Promise<void> {
    switch (job.kind) {
      case 'refresh':
        return this.refreshAccounts();
      case 'fetch-killmails':
        return this.fetchKillmails();
      case 'resolve-killmails':
        return this.resolveKillmails();
      case 'save-account':
        await this.accounts.upsert(job.account);
        return;
      case 'save-killmail-reference':
        await this.killmails.insertIfAbsent(job.killmailId, job.killmailHash, 'new');
        return;
      case 'save-entity':
        await this.entities.insertIfAbsent(job.entity);
        return;
      case 'save-killmail-entity':
        await this.killmailEntities.insertIfAbsent(job.link);
        return;
      case 'mark-account-fetched':
        return this.markAccountFetched(job.characterId, job.fetchedAt, job.killmailIds);
      case 'stop':
        this.logger.debug('Stop job outside the run loop ignored');
        return;
      default:
        assertNever(job);
    }
  }

  private async refreshAccounts(): Promise<void> {
    const filter = this.refreshAllAccounts
      ? {}
      : { expiresBefore: new Date(this.now().getTime() + this.refreshWindowMs) };
    const candidates = await this.accounts.list(filter);
    if (candidates.length === 0) {
      this.logger.debug('No account tokens due for refresh');
      return;
    }

    const refreshed = await this.tokens.refresh(candidates);
    for (const account of refreshed) {
      this.enqueue({ kind: 'save-account', account });
    }

    this.logger.info(
      { candidates: candidates.length, refreshed: refreshed.length },
      'Refreshed account tokens',
    );
  }

  private async fetchKillmails(): Promise<void> {
    const accounts = await this.accounts.list();

    const results = await Promise.allSettled(
      accounts.map(async (account) => {
        const requestedAt = this.now();
        const listing = await this.esi.getRecentKillmails(
          account.characterId,
          account.accessToken,
          account.lastFetchedAt,
        );

        const killmailIds: number[] = [];
        if (!listing.notModified) {
          for (const { killmailId, killmailHash } of listing.killmails) {
            this.enqueue({ kind: 'save-killmail-reference', killmailId, killmailHash });
            killmailIds.push(killmailId);
          }
        }
        this.enqueue({
          kind: 'mark-account-fetched',
          characterId: account.characterId,
          fetchedAt: listing.lastModified ?? requestedAt,
          killmailIds,
        });
        return listing.killmails.length;
      }),
    );

    let discovered = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        discovered += result.value;
        return;
      }
      this.logger.error(
        { err: result.reason, characterId: accounts[index]?.characterId },
        'Failed to list recent killmails',
      );
    });

    this.logger.info(
      { accounts: accounts.length, discovered, waitingSends: this.queue.waiting },
      'Listed recent killmails',
    );
    this.reportBacklog();
  }

  /**
   * Advances the conditional-listing cursor only once every reference from
   * that listing is stored, so a dropped or failed save is listed again.
   */
  private async markAccountFetched(
    characterId: number,
    fetchedAt: Date,
    killmailIds: readonly number[],
  ): Promise<void> {
    const stored = await this.killmails.countExisting(killmailIds);
    if (stored < killmailIds.length) {
      this.logger.warn(
        { characterId, expected: killmailIds.length, stored },
        'Killmail references missing, listing will be repeated',
      );
      return;
    }
    await this.accounts.markFetched(characterId, fetchedAt);
  }

  private async resolveKillmails(): Promise<void> {
    const pending = await this.killmails.listPending();

    const results = await Promise.allSettled(
      pending.map(async ({ killmailId, killmailHash }) => {
        const detail = await this.esi.getKillmail(killmailId, killmailHash);
        const sided = extractSidedEntities(detail, this.logger);
        const links = new Map<string, KillmailEntityLink>();
        for (const { entity, side } of sided) {
          this.enqueue({ kind: 'save-entity', entity });
          links.set(`${side}:${entity.type}:${entity.id}`, {
            killmailId,
            entityId: entity.id,
            entityType: entity.type,
            side,
          });
        }
        for (const link of links.values()) {
          this.enqueue({ kind: 'save-killmail-entity', link });
        }
        return sided.length;
      }),
    );

    let extracted = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        extracted += result.value;
        return;
      }
      this.logger.error(
        { err: result.reason, killmailId: pending[index]?.killmailId },
        'Failed to resolve killmail',
      );
    });

    this.logger.info(
      { killmails: pending.length, entities: extracted, waitingSends: this.queue.waiting },
      'Resolved killmails',
    );
    this.reportBacklog();
  }

  private reportBacklog(): void {
    if (this.queue.waiting > this.queue.capacity) {
      this.logger.warn(
        { waitingSends: this.queue.waiting, capacity: this.queue.capacity },
        'Jobs waiting for a queue slot exceed its capacity',
      );
    }
  }

  /**
   * Queue a follow-up job without waiting for admission: this processor is
   * the queue's only consumer, so waiting here could never finish once the
   * queue is full.
   */
  private enqueue(job: Job): void {
    const pending: Promise<void> = this.queue
      .send(job)
      .catch((error: unknown) => {
        this.logger.warn({ err: error, job: job.kind }, 'Follow-up job dropped');
      })
      .finally(() => {
        this.followUps.delete(pending);
      });
    this.followUps.add(pending);
  }
}
