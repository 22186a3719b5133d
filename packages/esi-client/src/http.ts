import { request } from 'undici';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import { SemanticAttributes } from '@opentelemetry/semantic-conventions';
import type { z } from 'zod';
import { DecodeError, HttpError, NetworkError, UnauthorizedAPIToken } from './errors.js';
import { requestCounter, requestDurationHistogram } from './metrics.js';

const tracer = trace.getTracer('killtrack.esi-client');

export type HttpMethod = 'GET' | 'POST';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface HttpRequestOptions {
  operationId: string;
  method: HttpMethod;
  url: URL;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  /** Non-2xx status codes the caller handles itself, such as 304. */
  acceptStatusCodes?: readonly number[];
}

export interface HttpResponse {
  statusCode: number;
  headers: ResponseHeaders;
  payload: unknown;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const toStatusClass = (statusCode: number | undefined): string => {
  if (!statusCode || statusCode < 100) {
    return 'error';
  }

  const hundred = Math.trunc(statusCode / 100);
  return `${hundred}xx`;
};

const describeBody = (body: unknown): string =>
  typeof body === 'string' ? body : JSON.stringify(body);

export const readHeader = (headers: ResponseHeaders, name: string): string | undefined => {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
};

const dispatch = async (
  { operationId, method, url }: HttpRequestOptions,
  target: string,
  signal: AbortSignal,
  headers: Record<string, string>,
  body: string | undefined,
): Promise<{ statusCode: number; headers: ResponseHeaders; raw: string }> => {
  try {
    const response = await request(url, {
      method,
      headers: { Accept: 'application/json', ...headers },
      body,
      signal,
    });
    const raw = await response.body.text();
    return { statusCode: response.statusCode, headers: response.headers, raw };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Request to ${operationId} failed: ${reason}`, {
      operationId,
      url: target,
      cause: error,
    });
  }
};

/**
 * Sends one request and returns the decoded JSON body.
 *
 * Transport failures become {@link NetworkError}, unexpected status codes
 * {@link HttpError} (or {@link UnauthorizedAPIToken} for 401/403) and
 * unparseable 2xx bodies {@link DecodeError}.
 */
export const sendRequest = async (options: HttpRequestOptions): Promise<HttpResponse> => {
  const {
    operationId,
    method,
    url,
    headers = {},
    body,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    acceptStatusCodes = [],
  } = options;
  const target = url.toString();

  return tracer.startActiveSpan(`http.${operationId}`, async (span) => {
    span.setAttribute(SemanticAttributes.HTTP_METHOD, method);
    span.setAttribute(SemanticAttributes.HTTP_URL, target);
    span.setAttribute(SemanticAttributes.NET_PEER_NAME, url.hostname);
    span.setAttribute('http.operation_id', operationId);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const start = performance.now();
    let statusCode: number | undefined;

    try {
      const response = await dispatch(options, target, controller.signal, headers, body);
      statusCode = response.statusCode;
      const { raw } = response;

      span.setAttribute(SemanticAttributes.HTTP_STATUS_CODE, statusCode);

      let parsed: unknown;
      let parseError: unknown;
      if (raw.length > 0) {
        try {
          parsed = JSON.parse(raw);
        } catch (error) {
          parseError = error;
        }
      }

      if (statusCode === 401 || statusCode === 403) {
        throw new UnauthorizedAPIToken(
          `${operationId} rejected the credentials with status ${statusCode}: ${raw}`,
          { statusCode, operationId, url: target, responseBody: parsed ?? raw },
        );
      }

      const accepted = acceptStatusCodes.includes(statusCode);
      if (!accepted && (statusCode < 200 || statusCode >= 300)) {
        const responseBody = parsed ?? raw;
        throw new HttpError(
          `${operationId} failed with status ${statusCode}: ${describeBody(responseBody)}`,
          { statusCode, operationId, url: target, responseBody },
        );
      }

      if (parseError !== undefined) {
        throw new DecodeError(`${operationId} returned a body that is not JSON`, {
          operationId,
          url: target,
          cause: parseError,
        });
      }

      const duration = (performance.now() - start) / 1000;
      requestCounter.add(1, {
        operation: operationId,
        http_method: method,
        status_class: toStatusClass(statusCode),
        result: 'success',
      });
      requestDurationHistogram.record(duration, {
        operation: operationId,
        http_method: method,
        result: 'success',
      });
      span.setStatus({ code: SpanStatusCode.OK });

      return { statusCode, headers: response.headers, payload: parsed };
    } catch (error) {
      const duration = (performance.now() - start) / 1000;
      requestCounter.add(1, {
        operation: operationId,
        http_method: method,
        status_class: toStatusClass(statusCode),
        result: 'error',
      });
      requestDurationHistogram.record(duration, {
        operation: operationId,
        http_method: method,
        result: 'error',
      });

      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      clearTimeout(timeout);
      span.end();
    }
  });
};

/**
 * Validates a decoded payload, reporting a mismatch as {@link DecodeError}.
 */
export const decodePayload = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  context: { operationId: string; url: URL },
): T => {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new DecodeError(
      `${context.operationId} returned an unexpected payload: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
        .join('; ')}`,
      { operationId: context.operationId, url: context.url.toString(), cause: result.error },
    );
  }
  return result.data;
};
