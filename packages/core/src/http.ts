import { fetch, type Response } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { HttpError, HttpTimeoutError, ResponseParseError } from './errors.js';
import type { FailureReason, FetchFailure } from './types.js';

export const DEFAULT_TIMEOUT_MS = 20000;

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

interface CoreRequest {
  method?: 'GET' | 'POST';
  body?: string;
  headers?: Record<string, string>;
}

/** Seconds or an HTTP date, as milliseconds from now. */
export function parseRetryAfterHeader(value?: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

/**
 * Runs one request and reads its body under a single timer, so a server that
 * sends headers and then stalls still times out.
 */
async function coreFetch<T>(
  url: string,
  init: CoreRequest,
  timeoutMs: number | undefined,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const limit = timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const ctrl = new AbortController();
  const timeout = setTimeout(() => ctrl.abort(), limit);

  try {
    const res = await fetch(url, {
      ...init,
      signal: ctrl.signal,
      headers: {
        'User-Agent': buildUserAgent(),
        ...init.headers
      }
    });

    if (!res.ok) {
      // Drain so the socket goes back to the pool
      await res.body?.cancel();
      throw new HttpError(res.status, url, res.statusText, parseRetryAfterHeader(res.headers.get('retry-after')));
    }
    return await read(res);
  } catch (error) {
    if (ctrl.signal.aborted) {
      throw new HttpTimeoutError(url, limit);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

function decodeJSON(url: string, text: string): unknown {
  try {
    const json: unknown = JSON.parse(text);
    return json;
  } catch (error) {
    throw new ResponseParseError(url, error instanceof Error ? error.message : 'Unknown error');
  }
}

export async function getJSON(url: string, options: RequestOptions = {}) {
  const text = await coreFetch(url, {
    headers: {
      'Accept': 'application/json',
      ...options.headers
    }
  }, options.timeoutMs, res => res.text());

  return { json: decodeJSON(url, text) };
}

export async function getText(url: string, options: RequestOptions = {}) {
  const text = await coreFetch(url, { headers: options.headers }, options.timeoutMs, res => res.text());
  return { text };
}

export async function postJSON(url: string, body: unknown, options: RequestOptions = {}) {
  const text = await coreFetch(url, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: {
      'Accept': 'application/json',
      'Content-Type': 'application/json',
      ...options.headers
    }
  }, options.timeoutMs, res => res.text());

  return { json: decodeJSON(url, text) };
}

/** Validates a decoded payload, reporting a mismatch as a parse failure. */
export function parseResponse<T>(schema: ZodType<T, ZodTypeDef, unknown>, json: unknown, url: string): T {
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ResponseParseError(url, issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape');
  }
  return parsed.data;
}

export function reasonForStatus(status: number): FailureReason {
  if (status === 404) return 'not-found';
  if (status === 429) return 'rate-limited';
  if (status === 401 || status === 403) return 'auth-required';
  return 'transport';
}

/** Maps anything an adapter's request can throw onto a failure outcome. */
export function failureFromError(error: unknown): FetchFailure {
  if (error instanceof HttpError) {
    const failure: FetchFailure = { ok: false, reason: reasonForStatus(error.status), message: error.message };
    if (error.retryAfterMs !== undefined) {
      failure.retryAfterMs = error.retryAfterMs;
    }
    return failure;
  }
  if (error instanceof ResponseParseError) {
    return { ok: false, reason: 'malformed', message: error.message };
  }
  return {
    ok: false,
    reason: 'transport',
    message: error instanceof Error ? error.message : String(error)
  };
}

export function buildUserAgent(contactEmail?: string): string {
  const base = 'citefetch/0.1';
  return contactEmail ? `${base} (mailto:${contactEmail})` : base;
}
