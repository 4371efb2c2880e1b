import type { LogRecord } from '../types/record';
import { stringifyValue } from '../utils/serialize';
import { BaseMiddleware } from './base-middleware';
import type { MiddlewareOptions } from './base-middleware';

export interface ContextMiddlewareOptions extends MiddlewareOptions {
  /** Fill `{key}` placeholders in the message from the merged extras */
  interpolate?: boolean;
}

/**
 * Merges a fixed context into the record extras. Call-site extras win.
 */
export class ContextMiddleware extends BaseMiddleware {
  private readonly context: Readonly<Record<string, unknown>>;
  private readonly interpolate: boolean;

  constructor(
    context: Record<string, unknown>,
    options: ContextMiddlewareOptions = {}
  ) {
    super('context', options);
    this.context = { ...context };
    this.interpolate = options.interpolate ?? false;
  }

  protected apply(record: LogRecord): LogRecord {
    const extra = { ...this.context, ...record.extra };
    const message = this.interpolate
      ? record.message.replace(/\{(\w+)\}/g, (match, key: string) =>
          Object.prototype.hasOwnProperty.call(extra, key)
            ? stringifyValue(extra[key])
            : match
        )
      : record.message;
    return { ...record, message, extra };
  }
}
