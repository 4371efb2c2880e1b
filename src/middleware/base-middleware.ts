import type { Logger } from '../logger';
import type { Filter } from '../types/filter';
import type { Middleware } from '../types/middleware';
import type { LogRecord } from '../types/record';

export interface MiddlewareOptions {
  name?: string;
  priority?: number;
  /** The step only applies to records these filters admit */
  filters?: Filter[];
}

/**
 * Middleware step with its own filters. Records the filters refuse pass
 * through unchanged.
 */
export abstract class BaseMiddleware implements Middleware {
  public readonly name: string;
  public readonly priority: number;
  public enabled = true;
  private readonly filters: readonly Filter[];

  constructor(defaultName: string, options: MiddlewareOptions = {}) {
    this.name = options.name ?? defaultName;
    this.priority = options.priority ?? 0;
    this.filters = [...(options.filters ?? [])];
  }

  process(record: LogRecord, logger: Logger): LogRecord | null {
    return this.applies(record) ? this.apply(record, logger) : record;
  }

  async processAsync(record: LogRecord, logger: Logger): Promise<LogRecord | null> {
    return this.applies(record) ? this.applyAsync(record, logger) : record;
  }

  protected abstract apply(record: LogRecord, logger: Logger): LogRecord | null;

  protected async applyAsync(
    record: LogRecord,
    logger: Logger
  ): Promise<LogRecord | null> {
    return this.apply(record, logger);
  }

  private applies(record: LogRecord): boolean {
    return this.filters.every(filter => filter.admit(record));
  }
}

export type MiddlewareFunction = (
  record: LogRecord,
  logger: Logger
) => LogRecord | null;

/**
 * Turn a plain function into a middleware step.
 */
export function defineMiddleware(
  name: string,
  fn: MiddlewareFunction,
  priority = 0
): Middleware {
  return {
    name,
    priority,
    enabled: true,
    process: fn,
  };
}
