import type { LogRecord } from '../types/record';
import { BaseMiddleware } from './base-middleware';
import type { MiddlewareOptions } from './base-middleware';

export const DEFAULT_REDACT_KEYS: readonly string[] = Object.freeze([
  'password',
  'token',
  'accessToken',
  'refreshToken',
  'authorization',
  'secret',
  'apiKey',
]);

export interface RedactMiddlewareOptions extends MiddlewareOptions {
  /** Replacement value. Default '[REDACTED]' */
  mask?: string;
  /** Walk nested objects and arrays. Default true */
  deep?: boolean;
}

/**
 * Masks extras whose key matches (case-insensitively) one of `keys`.
 */
export class RedactMiddleware extends BaseMiddleware {
  private readonly keys: ReadonlySet<string>;
  private readonly mask: string;
  private readonly deep: boolean;

  constructor(
    keys: readonly string[] = DEFAULT_REDACT_KEYS,
    options: RedactMiddlewareOptions = {}
  ) {
    super('redact', options);
    this.keys = new Set(keys.map(key => key.toLowerCase()));
    this.mask = options.mask ?? '[REDACTED]';
    this.deep = options.deep ?? true;
  }

  protected apply(record: LogRecord): LogRecord {
    const seen = new WeakSet<object>();
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record.extra)) {
      extra[key] = this.redactEntry(key, value, seen);
    }
    return { ...record, extra };
  }

  private redactEntry(key: string, value: unknown, seen: WeakSet<object>): unknown {
    if (this.keys.has(key.toLowerCase())) {
      return this.mask;
    }
    return this.deep ? this.redactValue(value, seen) : value;
  }

  private redactValue(value: unknown, seen: WeakSet<object>): unknown {
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (seen.has(value)) {
      return '[Circular]';
    }
    seen.add(value);
    if (Array.isArray(value)) {
      return value.map(item => this.redactValue(item, seen));
    }
    if (value instanceof Date || value instanceof Error) {
      return value;
    }
    const out: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      out[key] = this.redactEntry(key, nested, seen);
    }
    return out;
  }
}
