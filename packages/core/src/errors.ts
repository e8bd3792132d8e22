import type { EnforcedKeyType } from './config.js';
import type { CitationKey } from './types.js';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    statusText = '',
    /** From a Retry-After header, when the server sent one. */
    readonly retryAfterMs?: number
  ) {
    super(`${status} ${statusText} for ${url}`.replace(/\s+/g, ' '));
    this.name = 'HttpError';
  }
}

export class HttpTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class ResponseParseError extends Error {
  constructor(readonly url: string, detail: string) {
    super(`Failed to parse response from ${url}: ${detail}`);
    this.name = 'ResponseParseError';
  }
}

/**
 * Raised before any fetch when key-type enforcement is on and at least one key
 * has a different format. Nothing has been requested when this is thrown.
 */
export class KeyTypeMismatchError extends Error {
  constructor(
    readonly enforced: EnforcedKeyType,
    readonly offending: CitationKey[]
  ) {
    const listed = offending.map(k => `'${k.raw}' (${k.format})`).join(', ');
    super(`Key type is enforced as ${enforced}, but ${offending.length} key(s) differ: ${listed}`);
    this.name = 'KeyTypeMismatchError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}
