import { HandlerIOError } from '../errors';
import { LogLevel } from '../levels';
import type { LevelLike } from '../levels';
import type { Logger } from '../logger';
import type { Formatter } from '../types/formatter';
import type { RemoteSender } from '../types/handler';
import type { LogRecord } from '../types/record';
import { BaseMiddleware } from './base-middleware';
import type { MiddlewareOptions } from './base-middleware';

export interface AlertMiddlewareOptions extends MiddlewareOptions {
  sender: RemoteSender;
  destination: string;
  /** Minimum level that raises an alert. Default ERROR */
  threshold?: LevelLike;
  /** Defaults to the logger's formatter */
  formatter?: Formatter;
}

/**
 * Outer step that forwards severe records to a remote destination.
 * The record itself passes through unchanged.
 */
export class AlertMiddleware extends BaseMiddleware {
  public readonly destination: string;
  public readonly threshold: LogLevel;
  private readonly sender: RemoteSender;
  private readonly formatter?: Formatter;

  constructor(options: AlertMiddlewareOptions) {
    super('alert', { priority: 100, ...options });
    this.sender = options.sender;
    this.destination = options.destination;
    this.threshold = LogLevel.resolve(options.threshold ?? LogLevel.ERROR);
    this.formatter = options.formatter;
  }

  protected apply(record: LogRecord, logger: Logger): LogRecord {
    if (record.level.lt(this.threshold)) {
      return record;
    }
    const result = this.sender.send(this.destination, this.render(record, logger));
    if (result instanceof Promise) {
      void result.then(
        delivered => this.check(delivered, record, logger),
        (error: unknown) => logger.reportMiddlewareFailure(this, error, record)
      );
    } else {
      this.check(result, record, logger);
    }
    return record;
  }

  protected async applyAsync(record: LogRecord, logger: Logger): Promise<LogRecord> {
    if (record.level.lt(this.threshold)) {
      return record;
    }
    const delivered = await this.sender.send(
      this.destination,
      this.render(record, logger)
    );
    this.check(delivered, record, logger);
    return record;
  }

  private render(record: LogRecord, logger: Logger): string {
    return (this.formatter ?? logger.formatter).format(record);
  }

  private check(delivered: boolean, record: LogRecord, logger: Logger): void {
    if (!delivered) {
      logger.reportMiddlewareFailure(
        this,
        new HandlerIOError(`Alert delivery to ${this.destination} was refused`, {
          destination: this.destination,
        }),
        record
      );
    }
  }
}
