import { randomBytes, timingSafeEqual } from 'node:crypto';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import { importJWK, jwtVerify, type KeyLike } from 'jose';
import { DecodeError, decodePayload, sendRequest } from '@killtrack/esi-client';
import { createLogger, type Account, type Logger } from '@killtrack/shared';
import { StateMismatchError, TokenValidationError } from '../errors.js';
import {
  AuthClaimsSchema,
  EVESSOTokenResponseSchema,
  JsonWebKeySetSchema,
  type AuthClaims,
  type EVESSOTokenResponse,
} from '../schemas/index.js';

const tracer = trace.getTracer('killtrack.auth');

export const DEFAULT_SCOPES = [
  'publicData',
  'esi-killmails.read_killmails.v1',
  'esi-killmails.read_corporation_killmails.v1',
] as const;

const ACCEPTED_ISSUERS = ['login.eveonline.com', 'https://login.eveonline.com'];
const EVE_AUDIENCE = 'EVE Online';
const SIGNING_ALGORITHM = 'RS256';

export interface EveSsoConfig {
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
  scopes?: readonly string[];
  authorizeUrl?: string;
  tokenUrl?: string;
  jwksUrl?: string;
  timeoutMs?: number;
}

export type TokenGrant =
  | { kind: 'authorization-code'; code: string }
  | { kind: 'refresh-token'; refreshToken: string };

export interface AuthorizationRequest {
  url: string;
  /** Value of the `state` parameter; the caller keeps it and checks it on callback. */
  nonce: string;
}

/**
 * The operations the HTTP front end and the job processor need from EVE SSO.
 */
export interface TokenService {
  buildAuthorizationUrl(): AuthorizationRequest;
  exchangeAuthorizationCode(
    code: string,
    state: string,
    expectedNonce: string | undefined,
  ): Promise<Account>;
  refresh(accounts: readonly Account[]): Promise<Account[]>;
}

const sameNonce = (received: string, expected: string): boolean => {
  const left = Buffer.from(received);
  const right = Buffer.from(expected);
  return left.length === right.length && timingSafeEqual(left, right);
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * EVE Online SSO (OAuth2 authorization code flow with JWT access tokens).
 *
 * Stateless apart from its configuration: the signing keys are fetched on
 * every validation.
 */
export class EveSsoService implements TokenService {
  private readonly config: Required<EveSsoConfig>;
  private readonly logger: Logger;

  constructor(config: EveSsoConfig, logger?: Logger) {
    this.config = {
      ...config,
      scopes: config.scopes ?? DEFAULT_SCOPES,
      authorizeUrl: config.authorizeUrl ?? 'https://login.eveonline.com/v2/oauth/authorize',
      tokenUrl: config.tokenUrl ?? 'https://login.eveonline.com/v2/oauth/token',
      jwksUrl: config.jwksUrl ?? 'https://login.eveonline.com/oauth/jwks',
      timeoutMs: config.timeoutMs ?? 10_000,
    };
    this.logger = logger ?? createLogger({ serviceName: 'auth' });
  }

  buildAuthorizationUrl(): AuthorizationRequest {
    const nonce = randomBytes(32).toString('base64url');
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.config.clientId,
      redirect_uri: this.config.callbackUrl,
      scope: this.config.scopes.join(' '),
      state: nonce,
    });

    return { url: `${this.config.authorizeUrl}?${params.toString()}`, nonce };
  }

  /**
   * Completes the login callback. The state is checked before anything is sent
   * to the token endpoint.
   */
  async exchangeAuthorizationCode(
    code: string,
    state: string,
    expectedNonce: string | undefined,
  ): Promise<Account> {
    if (!expectedNonce || !sameNonce(state, expectedNonce)) {
      throw new StateMismatchError();
    }
    return this.exchange({ kind: 'authorization-code', code });
  }

  async exchange(grant: TokenGrant): Promise<Account> {
    return tracer.startActiveSpan(`eve-sso.exchange.${grant.kind}`, async (span) => {
      try {
        const tokens = await this.requestTokens(grant);
        const refreshToken =
          tokens.refresh_token ?? (grant.kind === 'refresh-token' ? grant.refreshToken : undefined);
        if (!refreshToken) {
          throw new DecodeError('Token response is missing refresh_token', {
            operationId: 'post_oauth_token',
            url: this.config.tokenUrl,
          });
        }

        const claims = await this.validate(tokens.access_token);
        span.setAttribute('character.id', claims.characterId);

        return {
          characterId: claims.characterId,
          accessToken: tokens.access_token,
          refreshToken,
          expiresAt: new Date(claims.exp * 1000),
        };
      } catch (error) {
        if (error instanceof Error) {
          span.recordException(error);
        }
        span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
        throw error;
      } finally {
        span.end();
      }
    });
  }

  /**
   * Verifies an access token against the live key set.
   */
  async validate(accessToken: string): Promise<AuthClaims> {
    const key = await this.loadSigningKey();

    let payload: unknown;
    try {
      const verified = await jwtVerify(accessToken, key, {
        algorithms: [SIGNING_ALGORITHM],
        audience: [this.config.clientId, EVE_AUDIENCE],
        issuer: ACCEPTED_ISSUERS,
        requiredClaims: ['sub'],
      });
      payload = verified.payload;
    } catch (error) {
      throw new TokenValidationError(`Access token rejected: ${describeError(error)}`, {
        cause: error,
      });
    }

    const claims = AuthClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new TokenValidationError(
        `Access token claims are malformed: ${claims.error.issues.map((issue) => issue.message).join('; ')}`,
        { cause: claims.error },
      );
    }
    return claims.data;
  }

  /**
   * Exchanges each account's refresh token in turn. Accounts whose exchange
   * fails are logged and left out of the result.
   */
  async refresh(accounts: readonly Account[]): Promise<Account[]> {
    const refreshed: Account[] = [];
    for (const account of accounts) {
      try {
        refreshed.push(
          await this.exchange({ kind: 'refresh-token', refreshToken: account.refreshToken }),
        );
      } catch (error) {
        this.logger.error(
          { err: error, characterId: account.characterId },
          'Failed to refresh account token',
        );
      }
    }
    return refreshed;
  }

  private async requestTokens(grant: TokenGrant): Promise<EVESSOTokenResponse> {
    const operationId = 'post_oauth_token';
    const url = new URL(this.config.tokenUrl);
    const body =
      grant.kind === 'authorization-code'
        ? new URLSearchParams({ grant_type: 'authorization_code', code: grant.code })
        : new URLSearchParams({ grant_type: 'refresh_token', refresh_token: grant.refreshToken });

    const response = await sendRequest({
      operationId,
      method: 'POST',
      url,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${this.encodeClientCredentials()}`,
      },
      body: body.toString(),
      timeoutMs: this.config.timeoutMs,
    });

    return decodePayload(EVESSOTokenResponseSchema, response.payload, { operationId, url });
  }

  private async loadSigningKey(): Promise<KeyLike | Uint8Array> {
    const operationId = 'get_oauth_jwks';
    const url = new URL(this.config.jwksUrl);

    try {
      const response = await sendRequest({
        operationId,
        method: 'GET',
        url,
        timeoutMs: this.config.timeoutMs,
      });
      const keySet = decodePayload(JsonWebKeySetSchema, response.payload, { operationId, url });
      const jwk = keySet.keys.find((candidate) => candidate.alg === SIGNING_ALGORITHM);
      if (!jwk) {
        throw new TokenValidationError(`Key set has no ${SIGNING_ALGORITHM} key`);
      }
      return await importJWK(jwk, SIGNING_ALGORITHM);
    } catch (error) {
      if (error instanceof TokenValidationError) {
        throw error;
      }
      throw new TokenValidationError(`Unable to load signing keys: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private encodeClientCredentials(): string {
    return Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');
  }
}

export function createEveSsoService(config: EveSsoConfig, logger?: Logger): EveSsoService {
  return new EveSsoService(config, logger);
}
