export { EsiClient, createEsiClient } from './client.js';
export type {
  EsiClientConfig,
  KillmailDocument,
  RecentKillmail,
  RecentKillmailsResult,
} from './client.js';
export { sendRequest, decodePayload, readHeader } from './http.js';
export type { HttpMethod, HttpRequestOptions, HttpResponse, ResponseHeaders } from './http.js';
export { NetworkError, HttpError, UnauthorizedAPIToken, DecodeError } from './errors.js';
