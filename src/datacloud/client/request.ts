import { logger } from '../../shared/logger.js';
import { DataCloudError, UpstreamError } from '../../shared/errors.js';
import type { CachedToken } from '../types.js';

export const DEFAULT_TIMEOUT_MS = 120_000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface DataCloudRequest {
  /** Human-readable name used in logs and errors, e.g. "Create Job" */
  operation: string;
  method: HttpMethod;
  url: string;
  accessToken?: string;
  body?: string | Uint8Array;
  contentType?: string;
  /** Statuses that count as success */
  expect: readonly number[];
  timeoutMs?: number;
}

export interface DataCloudResponse {
  status: number;
  body: string;
}

/**
 * Issue one HTTP call and return the raw status and body.
 * Any status outside `expect` raises a DataCloudError carrying the body verbatim.
 */
export async function send(req: DataCloudRequest): Promise<DataCloudResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = {};
  if (req.contentType) headers['Content-Type'] = req.contentType;
  if (req.accessToken) headers.Authorization = `Bearer ${req.accessToken}`;

  logger.debug({ operation: req.operation, method: req.method, url: req.url }, 'Data Cloud request');

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(req.url, {
      method: req.method,
      headers,
      body: req.body,
      signal: controller.signal,
    });
    const body = await res.text();

    if (!req.expect.includes(res.status)) {
      logger.error(
        { operation: req.operation, status: res.status, url: req.url, body },
        'Data Cloud request failed',
      );
      throw new DataCloudError(req.operation, req.url, res.status, body);
    }

    logger.debug({ operation: req.operation, status: res.status }, 'Data Cloud request returned');
    return { status: res.status, body };
  } catch (err: unknown) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new UpstreamError(
        `${req.operation} timed out after ${timeoutMs}ms`,
        'datacloud',
      );
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/** Where calls get their bearer token from. `DataCloudAuth` is one. */
export interface TokenSource {
  getToken(): Promise<CachedToken>;
  forceRefresh(): Promise<CachedToken>;
}

/**
 * Run `call` with the current token and, when it fails with 401, once more
 * with a fresh one. Everything `call` sent before the 401 is sent again, so
 * a call that writes must issue a single request.
 */
export async function withToken<T>(
  tokens: TokenSource,
  call: (token: CachedToken) => Promise<T>,
): Promise<T> {
  const token = await tokens.getToken();

  try {
    return await call(token);
  } catch (err: unknown) {
    if (err instanceof DataCloudError && err.status === 401) {
      logger.warn({ operation: err.operation }, 'Got 401, refreshing token and retrying');
      return call(await tokens.forceRefresh());
    }
    throw err;
  }
}

export function parseJson<T>(res: DataCloudResponse): T {
  return JSON.parse(res.body) as T;
}

/** Accepts `host`, `host/` or `https://host` and returns `https://host`. */
export function toBaseUrl(hostOrUrl: string): string {
  const trimmed = hostOrUrl.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}
