import type { Logger } from '../logger';
import type { Filter } from '../types/filter';
import type { Formatter } from '../types/formatter';
import type {
  HandleStatus,
  Handler,
  HandlerOptions,
} from '../types/handler';
import type { LogRecord } from '../types/record';

let handlerCounter = 0;

/**
 * Shared handler lifecycle: own filters, formatter fallback, failure capture.
 *
 * Subclasses implement `emit`. An emit that returns a promise makes the
 * blocking entry point report `queued`; the awaited entry point waits for it.
 */
export abstract class BaseHandler implements Handler {
  public readonly name: string;
  public formatter?: Formatter;
  private filterList: Filter[];
  protected closed = false;

  constructor(options: HandlerOptions = {}) {
    this.name = options.name ?? `${new.target.name}-${++handlerCounter}`;
    this.formatter = options.formatter;
    this.filterList = [...(options.filters ?? [])];
  }

  get filters(): readonly Filter[] {
    return this.filterList;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  addFilter(filter: Filter): void {
    this.filterList = [...this.filterList, filter];
  }

  removeFilter(filter: Filter): boolean {
    const next = this.filterList.filter(f => f !== filter);
    const removed = next.length !== this.filterList.length;
    this.filterList = next;
    return removed;
  }

  handle(record: LogRecord, logger: Logger): HandleStatus {
    if (this.closed || !this.admits(record, logger)) {
      return 'rejected';
    }
    try {
      const text = this.render(record, this.formatter ?? logger.formatter);
      const pending = this.emit(record, text, logger);
      if (pending instanceof Promise) {
        void pending.then(undefined, (error: unknown) =>
          logger.reportHandlerFailure(this, error, record)
        );
        return 'queued';
      }
      return 'emitted';
    } catch (error) {
      logger.reportHandlerFailure(this, error, record);
      return 'failed';
    }
  }

  async handleAsync(record: LogRecord, logger: Logger): Promise<HandleStatus> {
    if (this.closed || !this.admits(record, logger)) {
      return 'rejected';
    }
    try {
      const text = this.render(record, this.formatter ?? logger.formatter);
      await this.emitAsync(record, text, logger);
      return 'emitted';
    } catch (error) {
      logger.reportHandlerFailure(this, error, record);
      return 'failed';
    }
  }

  close(): void | Promise<void> {
    this.closed = true;
  }

  protected render(record: LogRecord, formatter: Formatter): string {
    return formatter.format(record);
  }

  protected abstract emit(
    record: LogRecord,
    text: string,
    logger: Logger
  ): void | Promise<void>;

  protected async emitAsync(
    record: LogRecord,
    text: string,
    logger: Logger
  ): Promise<void> {
    await this.emit(record, text, logger);
  }

  // A throwing filter counts as rejecting and is reported
  private admits(record: LogRecord, logger: Logger): boolean {
    for (const filter of this.filterList) {
      try {
        if (!filter.admit(record)) {
          return false;
        }
      } catch (error) {
        logger.reportFilterFailure(filter, error, record, this);
        return false;
      }
    }
    return true;
  }
}
