import { z } from 'zod';
import { DecodeError } from './errors.js';
import { decodePayload, readHeader, sendRequest, type HttpRequestOptions } from './http.js';

const DEFAULT_BASE_URL = 'https://esi.evetech.net/latest/';
const DEFAULT_DATASOURCE = 'tranquility';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_USER_AGENT = 'killtrack/0.1 (killmail collector)';
const NOT_MODIFIED = 304;

const RecentKillmailSchema = z.object({
  killmail_id: z.number().int(),
  killmail_hash: z.string().min(1),
});

const RecentKillmailsResponseSchema = z.array(RecentKillmailSchema);

export interface RecentKillmail {
  killmailId: number;
  killmailHash: string;
}

export interface RecentKillmailsResult {
  killmails: RecentKillmail[];
  /** True when ESI answered 304 to a conditional request. */
  notModified: boolean;
  lastModified: Date | null;
}

export type KillmailDocument = Record<string, unknown>;

const isRecord = (value: unknown): value is KillmailDocument =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const normalizeBaseUrl = (value: string): string => (value.endsWith('/') ? value : `${value}/`);

const parseHttpDate = (value: string | undefined): Date | null => {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

export interface EsiClientConfig {
  baseUrl?: string;
  datasource?: string;
  timeoutMs?: number;
  userAgent?: string;
}

interface RequestOptions {
  operationId: string;
  path: string;
  headers?: Record<string, string>;
  acceptStatusCodes?: HttpRequestOptions['acceptStatusCodes'];
}

export class EsiClient {
  private readonly baseUrl: string;
  private readonly datasource: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(config: EsiClientConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.datasource = config.datasource ?? DEFAULT_DATASOURCE;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * List the killmails a character was recently involved in.
   *
   * @param ifModifiedSince - Last successful fetch; ESI answers 304 when nothing changed.
   */
  async getRecentKillmails(
    characterId: number,
    accessToken: string,
    ifModifiedSince?: Date | null,
  ): Promise<RecentKillmailsResult> {
    const operationId = 'get_characters_character_id_killmails_recent';
    const headers: Record<string, string> = { Authorization: `Bearer ${accessToken}` };
    if (ifModifiedSince) {
      headers['If-Modified-Since'] = ifModifiedSince.toUTCString();
    }

    const { url, response } = await this.get({
      operationId,
      path: `characters/${characterId}/killmails/recent/`,
      headers,
      acceptStatusCodes: [NOT_MODIFIED],
    });

    const lastModified = parseHttpDate(readHeader(response.headers, 'last-modified'));
    if (response.statusCode === NOT_MODIFIED) {
      return { killmails: [], notModified: true, lastModified };
    }

    const entries = decodePayload(RecentKillmailsResponseSchema, response.payload, {
      operationId,
      url,
    });

    return {
      killmails: entries.map((entry) => ({
        killmailId: entry.killmail_id,
        killmailHash: entry.killmail_hash,
      })),
      notModified: false,
      lastModified,
    };
  }

  /**
   * Fetch the full killmail document. The shape is left to the caller to interpret.
   */
  async getKillmail(killmailId: number, killmailHash: string): Promise<KillmailDocument> {
    const operationId = 'get_killmails_killmail_id_killmail_hash';
    const { url, response } = await this.get({
      operationId,
      path: `killmails/${killmailId}/${encodeURIComponent(killmailHash)}/`,
    });

    if (!isRecord(response.payload)) {
      throw new DecodeError(`${operationId} did not return a JSON object`, {
        operationId,
        url: url.toString(),
      });
    }

    return response.payload;
  }

  private buildUrl(path: string): URL {
    const relativePath = path.startsWith('/') ? path.slice(1) : path;
    const url = new URL(relativePath, this.baseUrl);
    url.searchParams.set('datasource', this.datasource);
    return url;
  }

  private async get(options: RequestOptions) {
    const url = this.buildUrl(options.path);
    const response = await sendRequest({
      operationId: options.operationId,
      method: 'GET',
      url,
      headers: { 'User-Agent': this.userAgent, ...options.headers },
      timeoutMs: this.timeoutMs,
      acceptStatusCodes: options.acceptStatusCodes,
    });
    return { url, response };
  }
}

export const createEsiClient = (config: EsiClientConfig = {}): EsiClient => new EsiClient(config);
