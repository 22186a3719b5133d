import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AccountRepository,
  EntityRepository,
  KillmailEntityRepository,
  KillmailRepository,
  PersistenceError,
  type AccountStore,
  type KillmailStore,
} from '@killtrack/database';
import { createInMemoryDatabase, type InMemoryDatabase } from '@killtrack/database/testing';
import { NetworkError, type KillmailDocument, type RecentKillmailsResult } from '@killtrack/esi-client';
import { createLogger, type Account } from '@killtrack/shared';
import type { Job } from '../src/jobs.js';
import { Processor, type KillmailSource } from '../src/processor.js';
import { JobQueue } from '../src/queue.js';

const logger = createLogger({ serviceName: 'processor-test', level: 'silent' });
const NOW = new Date('2025-06-01T12:00:00Z');

class FakeKillmailSource implements KillmailSource {
  readonly listings = new Map<number, RecentKillmailsResult | Error>();
  readonly details = new Map<number, KillmailDocument | Error>();
  readonly listingRequests: Array<{ characterId: number; ifModifiedSince: Date | null | undefined }> =
    [];

  async getRecentKillmails(
    characterId: number,
    _accessToken: string,
    ifModifiedSince?: Date | null,
  ): Promise<RecentKillmailsResult> {
    this.listingRequests.push({ characterId, ifModifiedSince });
    const listing = this.listings.get(characterId);
    if (listing === undefined) {
      return { killmails: [], notModified: false, lastModified: null };
    }
    if (listing instanceof Error) {
      throw listing;
    }
    return listing;
  }

  async getKillmail(killmailId: number): Promise<KillmailDocument> {
    const detail = this.details.get(killmailId);
    if (detail === undefined || detail instanceof Error) {
      throw detail ?? new Error(`no detail for ${killmailId}`);
    }
    return detail;
  }
}

class FakeTokenService {
  readonly received: number[][] = [];

  async refresh(accounts: readonly Account[]): Promise<Account[]> {
    this.received.push(accounts.map((account) => account.characterId));
    return accounts.map((account) => ({
      characterId: account.characterId,
      accessToken: `${account.accessToken}-renewed`,
      refreshToken: `${account.refreshToken}-renewed`,
      expiresAt: new Date('2025-06-01T12:20:00Z'),
    }));
  }
}

const processQueued = async (processor: Processor, queue: JobQueue): Promise<Job[]> => {
  const handled: Job[] = [];
  while (queue.size > 0) {
    const job = await queue.receive();
    handled.push(job);
    await processor.process(job);
  }
  return handled;
};

const drainQueue = async (queue: JobQueue): Promise<Job[]> => {
  const jobs: Job[] = [];
  while (queue.size > 0) {
    jobs.push(await queue.receive());
  }
  return jobs;
};

describe('Processor', () => {
  let testDb: InMemoryDatabase;
  let accounts: AccountRepository;
  let killmails: KillmailRepository;
  let entities: EntityRepository;
  let killmailEntities: KillmailEntityRepository;
  let esi: FakeKillmailSource;
  let tokens: FakeTokenService;

  const createProcessor = (
    queue: JobQueue,
    overrides: { accounts?: AccountStore; killmails?: KillmailStore } = {},
  ) =>
    new Processor({
      queue,
      tokens,
      esi,
      accounts: overrides.accounts ?? accounts,
      killmails: overrides.killmails ?? killmails,
      entities,
      killmailEntities,
      logger,
      now: () => NOW,
    });

  const storedEntities = async () => {
    const rows = await testDb.db.selectFrom('entities').select(['id', 'type']).execute();
    return rows
      .map((row) => `${row.type}:${Number(row.id)}`)
      .sort();
  };

  beforeEach(async () => {
    testDb = await createInMemoryDatabase();
    accounts = new AccountRepository(testDb.db);
    killmails = new KillmailRepository(testDb.db);
    entities = new EntityRepository(testDb.db);
    killmailEntities = new KillmailEntityRepository(testDb.db);
    esi = new FakeKillmailSource();
    tokens = new FakeTokenService();
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('persists save jobs and stops on the stop job', async () => {
    const queue = new JobQueue(10);
    queue.trySend({
      kind: 'save-account',
      account: {
        characterId: 90000001,
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: new Date('2025-06-01T12:20:00Z'),
      },
    });
    queue.trySend({ kind: 'save-killmail-reference', killmailId: 100, killmailHash: 'abc' });
    queue.trySend({ kind: 'save-entity', entity: { id: 30000142, name: '', type: 'solar_system' } });
    queue.trySend({ kind: 'stop' });
    queue.trySend({ kind: 'save-entity', entity: { id: 1, name: '', type: 'character' } });

    await createProcessor(queue).run();

    expect((await accounts.list()).map((account) => account.characterId)).toEqual([90000001]);
    expect(await killmails.listPending()).toEqual([
      { killmailId: 100, killmailHash: 'abc', status: 'new' },
    ]);
    expect(await storedEntities()).toEqual(['solar_system:30000142']);
    expect(queue.closed).toBe(true);
    expect(queue.size).toBe(0);
  });

  it('refreshes only accounts expiring within the window', async () => {
    await accounts.upsert({
      characterId: 90000001,
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date('2025-06-01T12:05:00Z'),
    });
    await accounts.upsert({
      characterId: 90000002,
      accessToken: 'access-2',
      refreshToken: 'refresh-2',
      expiresAt: new Date('2025-06-01T14:00:00Z'),
    });
    const queue = new JobQueue(10);
    const processor = createProcessor(queue);

    await processor.process({ kind: 'refresh' });

    expect(tokens.received).toEqual([[90000001]]);
    const jobs = await drainQueue(queue);
    expect(jobs).toEqual([
      {
        kind: 'save-account',
        account: {
          characterId: 90000001,
          accessToken: 'access-1-renewed',
          refreshToken: 'refresh-1-renewed',
          expiresAt: new Date('2025-06-01T12:20:00Z'),
        },
      },
    ]);
  });

  it('lists killmails for every account and keeps going past failures', async () => {
    const lastModified = new Date('2025-06-01T11:55:00Z');
    for (const characterId of [90000001, 90000002]) {
      await accounts.upsert({
        characterId,
        accessToken: `access-${characterId}`,
        refreshToken: `refresh-${characterId}`,
        expiresAt: new Date('2025-06-01T12:20:00Z'),
      });
    }
    esi.listings.set(90000001, {
      killmails: [
        { killmailId: 100, killmailHash: 'abc' },
        { killmailId: 101, killmailHash: 'def' },
      ],
      notModified: false,
      lastModified,
    });
    esi.listings.set(
      90000002,
      new NetworkError('socket hang up', { operationId: 'recent', url: 'https://esi.test' }),
    );
    const queue = new JobQueue(10);
    const processor = createProcessor(queue);

    await processor.process({ kind: 'fetch-killmails' });

    expect(await processQueued(processor, queue)).toEqual([
      { kind: 'save-killmail-reference', killmailId: 100, killmailHash: 'abc' },
      { kind: 'save-killmail-reference', killmailId: 101, killmailHash: 'def' },
      {
        kind: 'mark-account-fetched',
        characterId: 90000001,
        fetchedAt: lastModified,
        killmailIds: [100, 101],
      },
    ]);
    const stored = await accounts.list();
    expect(stored.map((account) => account.lastFetchedAt)).toEqual([lastModified, null]);
    expect(esi.listingRequests).toEqual([
      { characterId: 90000001, ifModifiedSince: null },
      { characterId: 90000002, ifModifiedSince: null },
    ]);
  });

  it('sends the previous fetch time and queues no references when not modified', async () => {
    await accounts.upsert({
      characterId: 90000001,
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date('2025-06-01T12:20:00Z'),
    });
    await accounts.markFetched(90000001, new Date('2025-06-01T11:00:00Z'));
    esi.listings.set(90000001, { killmails: [], notModified: true, lastModified: null });
    const queue = new JobQueue(10);
    const processor = createProcessor(queue);

    await processor.process({ kind: 'fetch-killmails' });

    expect(await processQueued(processor, queue)).toEqual([
      { kind: 'mark-account-fetched', characterId: 90000001, fetchedAt: NOW, killmailIds: [] },
    ]);
    expect(esi.listingRequests).toEqual([
      { characterId: 90000001, ifModifiedSince: new Date('2025-06-01T11:00:00Z') },
    ]);
    const [account] = await accounts.list();
    expect(account?.lastFetchedAt).toEqual(NOW);
  });

  it('resolves pending killmails into entity jobs in extraction order', async () => {
    await killmails.insertIfAbsent(100, 'abc');
    await killmails.insertIfAbsent(101, 'def');
    esi.details.set(100, {
      killmail_id: 100,
      killmail_hash: 'abc',
      solar_system_id: 30000142,
      victim: { character_id: 1, corporation_id: 10 },
      attackers: [{ character_id: 2, ship_type_id: 600 }],
    });
    esi.details.set(101, new Error('gateway timeout'));
    const queue = new JobQueue(20);

    await createProcessor(queue).process({ kind: 'resolve-killmails' });

    const jobs = await drainQueue(queue);
    expect(jobs.filter((job) => job.kind === 'save-entity')).toEqual([
      { kind: 'save-entity', entity: { id: 30000142, name: '', type: 'solar_system' } },
      { kind: 'save-entity', entity: { id: 1, name: '', type: 'character' } },
      { kind: 'save-entity', entity: { id: 10, name: '', type: 'corporation' } },
      { kind: 'save-entity', entity: { id: 2, name: '', type: 'character' } },
      { kind: 'save-entity', entity: { id: 600, name: '', type: 'ship_type' } },
    ]);
    expect(jobs.slice(5)).toEqual([
      {
        kind: 'save-killmail-entity',
        link: { killmailId: 100, entityId: 30000142, entityType: 'solar_system', side: 'location' },
      },
      {
        kind: 'save-killmail-entity',
        link: { killmailId: 100, entityId: 1, entityType: 'character', side: 'victim' },
      },
      {
        kind: 'save-killmail-entity',
        link: { killmailId: 100, entityId: 10, entityType: 'corporation', side: 'victim' },
      },
      {
        kind: 'save-killmail-entity',
        link: { killmailId: 100, entityId: 2, entityType: 'character', side: 'attacker' },
      },
      {
        kind: 'save-killmail-entity',
        link: { killmailId: 100, entityId: 600, entityType: 'ship_type', side: 'attacker' },
      },
    ]);
  });

  it('links each killmail to its entities once per side', async () => {
    await killmails.insertIfAbsent(100, 'abc');
    esi.details.set(100, {
      solar_system_id: 30000142,
      victim: { character_id: 1, corporation_id: 10 },
      attackers: [
        { character_id: 2, corporation_id: 10 },
        { character_id: 3, corporation_id: 10 },
      ],
    });
    const queue = new JobQueue(20);
    const processor = createProcessor(queue);

    await processor.process({ kind: 'resolve-killmails' });
    await processQueued(processor, queue);
    await processor.process({ kind: 'resolve-killmails' });
    await processQueued(processor, queue);

    const links = await killmailEntities.listForKillmail(100);
    expect(links.map((link) => `${link.side}:${link.entityType}:${link.entityId}`).sort()).toEqual([
      'attacker:character:2',
      'attacker:character:3',
      'attacker:corporation:10',
      'location:solar_system:30000142',
      'victim:character:1',
      'victim:corporation:10',
    ]);
  });

  it('does not deadlock when a fan-out exceeds the queue capacity', async () => {
    await killmails.insertIfAbsent(100, 'abc');
    esi.details.set(100, {
      solar_system_id: 30000142,
      victim: { character_id: 1, corporation_id: 10 },
      attackers: [{ character_id: 2, ship_type_id: 600 }],
    });
    const queue = new JobQueue(2);
    const processor = createProcessor(queue);

    await processor.process({ kind: 'resolve-killmails' });
    expect(queue.size).toBe(2);
    expect(queue.waiting).toBe(8);

    const stopping = queue.send({ kind: 'stop' });
    await processor.run();
    await stopping;

    expect(await storedEntities()).toEqual([
      'character:1',
      'character:2',
      'corporation:10',
      'ship_type:600',
      'solar_system:30000142',
    ]);
    expect(await killmailEntities.listForKillmail(100)).toHaveLength(5);
  });

  it('warns when jobs waiting for a slot outnumber the capacity', async () => {
    await killmails.insertIfAbsent(100, 'abc');
    esi.details.set(100, {
      solar_system_id: 30000142,
      victim: { character_id: 1, corporation_id: 10 },
      attackers: [{ character_id: 2, ship_type_id: 600 }],
    });
    const queue = new JobQueue(2);
    const warn = vi.spyOn(logger, 'warn');

    try {
      await createProcessor(queue).process({ kind: 'resolve-killmails' });

      expect(warn).toHaveBeenCalledWith(
        { waitingSends: 8, capacity: 2 },
        'Jobs waiting for a queue slot exceed its capacity',
      );
    } finally {
      warn.mockRestore();
      queue.close();
    }
  });

  it('lists killmails again when their references were dropped by stop', async () => {
    await accounts.upsert({
      characterId: 90000001,
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date('2025-06-01T12:20:00Z'),
    });
    const lastModified = new Date('2025-06-01T11:55:00Z');
    esi.listings.set(90000001, {
      killmails: [
        { killmailId: 100, killmailHash: 'abc' },
        { killmailId: 101, killmailHash: 'def' },
        { killmailId: 102, killmailHash: 'ghi' },
      ],
      notModified: false,
      lastModified,
    });

    const first = new JobQueue(10);
    first.trySend({ kind: 'fetch-killmails' });
    first.trySend({ kind: 'stop' });
    await createProcessor(first).run();

    expect(await killmails.listPending()).toEqual([]);
    const [afterStop] = await accounts.list();
    expect(afterStop?.lastFetchedAt).toBeNull();

    const second = new JobQueue(10);
    const processor = createProcessor(second);
    await processor.process({ kind: 'fetch-killmails' });
    await processQueued(processor, second);

    expect(esi.listingRequests.map((request) => request.ifModifiedSince)).toEqual([null, null]);
    expect((await killmails.listPending()).map((reference) => reference.killmailId)).toEqual([
      100, 101, 102,
    ]);
    const [afterRetry] = await accounts.list();
    expect(afterRetry?.lastFetchedAt).toEqual(lastModified);
  });

  it('keeps the listing cursor when a reference could not be stored', async () => {
    await accounts.upsert({
      characterId: 90000001,
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date('2025-06-01T12:20:00Z'),
    });
    esi.listings.set(90000001, {
      killmails: [
        { killmailId: 100, killmailHash: 'abc' },
        { killmailId: 101, killmailHash: 'def' },
      ],
      notModified: false,
      lastModified: new Date('2025-06-01T11:55:00Z'),
    });
    const flaky: KillmailStore = {
      insertIfAbsent: (killmailId, killmailHash, status) =>
        killmailId === 101
          ? Promise.reject(new PersistenceError('insertKillmailIfAbsent', new Error('disk full')))
          : killmails.insertIfAbsent(killmailId, killmailHash, status),
      updateStatus: (killmailId, status) => killmails.updateStatus(killmailId, status),
      listPending: () => killmails.listPending(),
      countExisting: (killmailIds) => killmails.countExisting(killmailIds),
    };
    const queue = new JobQueue(10);
    const processor = createProcessor(queue, { killmails: flaky });

    await processor.process({ kind: 'fetch-killmails' });
    await processQueued(processor, queue);

    const [account] = await accounts.list();
    expect(account?.lastFetchedAt).toBeNull();
    expect((await killmails.listPending()).map((reference) => reference.killmailId)).toEqual([100]);
  });

  it('logs and swallows storage failures', async () => {
    const failing: AccountStore = {
      upsert: () => Promise.reject(new PersistenceError('upsertAccount', new Error('disk full'))),
      list: () => Promise.reject(new PersistenceError('queryAccounts', new Error('disk full'))),
      markFetched: () => Promise.resolve(0),
    };
    const queue = new JobQueue(10);
    const processor = createProcessor(queue, { accounts: failing });

    await expect(
      processor.process({
        kind: 'save-account',
        account: {
          characterId: 90000001,
          accessToken: 'access-1',
          refreshToken: 'refresh-1',
          expiresAt: NOW,
        },
      }),
    ).resolves.toBeUndefined();
    await expect(processor.process({ kind: 'refresh' })).resolves.toBeUndefined();
    expect(tokens.received).toEqual([]);
  });
});
