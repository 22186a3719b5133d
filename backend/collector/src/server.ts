import Fastify from 'fastify';
import cookie from '@fastify/cookie';
import { z } from 'zod';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { StateMismatchError, type TokenService } from '@killtrack/auth';
import { createLogger, type Account, type Logger } from '@killtrack/shared';
import { FETCH_KILLMAILS_JOB, REFRESH_JOB, RESOLVE_KILLMAILS_JOB, type Job } from './jobs.js';
import { QueueFullError, type JobQueue } from './queue.js';

export const STATE_COOKIE = 'killtrack_state';
const STATE_COOKIE_MAX_AGE_SECONDS = 10 * 60;
const STATE_COOKIE_PATH = '/auth';

const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  queue: z.object({ size: z.number().int(), capacity: z.number().int() }),
});

const AuthCallbackQuerySchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

const TRIGGERS: ReadonlyArray<{ path: string; job: Job }> = [
  { path: '/jobs/refresh', job: REFRESH_JOB },
  { path: '/jobs/killmails', job: FETCH_KILLMAILS_JOB },
  { path: '/jobs/resolve', job: RESOLVE_KILLMAILS_JOB },
];

export interface BuildServerOptions {
  queue: JobQueue;
  tokens: Pick<TokenService, 'buildAuthorizationUrl' | 'exchangeAuthorizationCode'>;
  logger?: Logger;
  secureCookies?: boolean;
}

/**
 * Login initiation, the SSO callback and manual job triggers. Every route
 * feeds the queue with `trySend` and answers 503 when it is full.
 */
export const buildServer = ({ queue, tokens, logger, secureCookies = false }: BuildServerOptions) => {
  const app = Fastify({
    loggerInstance: logger ?? createLogger({ serviceName: 'collector-http' }),
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  void app.register(cookie);

  app.setErrorHandler((error, request, reply) => {
    const statusCode =
      typeof error === 'object' &&
      error !== null &&
      'statusCode' in error &&
      typeof error.statusCode === 'number'
        ? error.statusCode
        : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error, url: request.url, method: request.method }, 'Request error');
      return reply.status(statusCode).send({ message: 'Internal server error' });
    }
    const message = error instanceof Error ? error.message : 'Bad request';
    return reply.status(statusCode).send({ message });
  });

  app.get(
    '/healthz',
    { schema: { response: { 200: HealthResponseSchema } } },
    async () => ({
      status: 'ok' as const,
      queue: { size: queue.size, capacity: queue.capacity },
    }),
  );

  app.get('/auth/login', async (_request, reply) => {
    const { url, nonce } = tokens.buildAuthorizationUrl();
    reply.setCookie(STATE_COOKIE, nonce, {
      path: STATE_COOKIE_PATH,
      httpOnly: true,
      sameSite: 'lax',
      secure: secureCookies,
      maxAge: STATE_COOKIE_MAX_AGE_SECONDS,
    });
    return reply.redirect(url, 302);
  });

  app.get(
    '/auth/callback',
    { schema: { querystring: AuthCallbackQuerySchema } },
    async (request, reply) => {
      const { code, state } = request.query;
      const expectedNonce = request.cookies[STATE_COOKIE];
      reply.clearCookie(STATE_COOKIE, { path: STATE_COOKIE_PATH });

      let account: Account;
      try {
        account = await tokens.exchangeAuthorizationCode(code, state, expectedNonce);
      } catch (error) {
        if (error instanceof StateMismatchError) {
          return reply.status(400).send({ message: 'Invalid or expired login state' });
        }
        request.log.error({ err: error }, 'Authorization code exchange failed');
        return reply.status(502).send({ message: 'Authorization with EVE SSO failed' });
      }

      try {
        queue.trySend({ kind: 'save-account', account });
      } catch (error) {
        if (error instanceof QueueFullError) {
          return reply.status(503).send({ message: error.message });
        }
        throw error;
      }

      request.log.info({ characterId: account.characterId }, 'Account authorized');
      return reply.status(200).send({ characterId: account.characterId });
    },
  );

  for (const { path, job } of TRIGGERS) {
    app.post(path, async (_request, reply) => {
      try {
        queue.trySend(job);
      } catch (error) {
        if (error instanceof QueueFullError) {
          return reply.status(503).send({ message: error.message });
        }
        throw error;
      }
      return reply.status(202).send({ queued: job.kind });
    });
  }

  return app;
};
