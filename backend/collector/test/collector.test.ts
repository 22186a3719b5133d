import { describe, expect, it } from 'vitest';
import type { TokenService } from '@killtrack/auth';
import { createInMemoryDatabase } from '@killtrack/database/testing';
import type { KillmailDocument, RecentKillmailsResult } from '@killtrack/esi-client';
import { createLogger, type Account } from '@killtrack/shared';
import { createCollector } from '../src/collector.js';
import { loadConfig } from '../src/config.js';
import type { KillmailSource } from '../src/processor.js';

const logger = createLogger({ serviceName: 'collector-test', level: 'silent' });

const config = loadConfig({
  ESI_CLIENT_ID: 'test-client',
  ESI_CLIENT_SECRET: 'test-secret',
  ESI_CALLBACK_URL: 'http://localhost:3000/auth/callback',
});

class IdleKillmailSource implements KillmailSource {
  async getRecentKillmails(): Promise<RecentKillmailsResult> {
    return { killmails: [], notModified: false, lastModified: null };
  }

  async getKillmail(killmailId: number): Promise<KillmailDocument> {
    throw new Error(`no detail for ${killmailId}`);
  }
}

class IdleTokenService implements TokenService {
  buildAuthorizationUrl() {
    return { url: 'https://login.eveonline.com/v2/oauth/authorize', nonce: 'nonce-1' };
  }

  async exchangeAuthorizationCode(): Promise<Account> {
    throw new Error('not expected');
  }

  async refresh(accounts: readonly Account[]): Promise<Account[]> {
    return [...accounts];
  }
}

const createTestCollector = async () => {
  const testDb = await createInMemoryDatabase();
  const collector = createCollector({
    config,
    logger,
    db: testDb.db,
    esi: new IdleKillmailSource(),
    sso: new IdleTokenService(),
  });
  return { collector, db: testDb.db };
};

describe('createCollector', () => {
  it('releases everything when the HTTP server cannot listen', async () => {
    const { collector, db } = await createTestCollector();
    collector.server.addHook('onReady', async () => {
      throw new Error('listen EADDRINUSE: address already in use');
    });

    await expect(collector.start()).rejects.toThrow('listen EADDRINUSE: address already in use');

    expect(collector.queue.closed).toBe(true);
    expect(() => collector.queue.trySend({ kind: 'refresh' })).toThrow('Job queue is closed');
    await expect(db.selectFrom('accounts').selectAll().execute()).rejects.toThrow();
  });

  it('shuts down once even when asked twice', async () => {
    const { collector, db } = await createTestCollector();

    const first = collector.shutdown();
    const second = collector.shutdown();

    expect(second).toBe(first);
    await first;
    expect(collector.queue.closed).toBe(true);
    await expect(db.selectFrom('accounts').selectAll().execute()).rejects.toThrow();
  });
});
