import type { TransformableInfo } from 'logform';
import type Transport from 'winston-transport';
import { HandlerIOError, describeError } from '../errors';
import { LogLevel } from '../levels';
import type { Logger } from '../logger';
import type { HandlerOptions } from '../types/handler';
import type { LogRecord } from '../types/record';
import { BaseHandler } from './base-handler';

const LEVEL = Symbol.for('level');
const MESSAGE = Symbol.for('message');

/**
 * Nearest winston npm level name for a record level.
 */
export function levelToWinston(level: LogLevel): string {
  if (level.ge(LogLevel.ERROR)) {
    return 'error';
  }
  if (level.ge(LogLevel.WARNING)) {
    return 'warn';
  }
  if (level.ge(LogLevel.INFO)) {
    return 'info';
  }
  if (level.ge(LogLevel.DEBUG)) {
    return 'debug';
  }
  return 'silly';
}

export interface TransportHandlerOptions extends HandlerOptions {
  transport: Transport;
}

/**
 * Forwards records to a winston transport (console, file, Http, or any
 * third-party transport). The formatted text travels as the info's
 * MESSAGE symbol, the record fields as regular properties.
 */
export class TransportHandler extends BaseHandler {
  public readonly transport: Transport;
  private owner?: Logger;

  constructor(options: TransportHandlerOptions) {
    super(options);
    this.transport = options.transport;
    this.transport.on('error', (error: unknown) => this.onTransportError(error));
  }

  protected emit(record: LogRecord, text: string, logger: Logger): void {
    this.owner = logger;
    const info = this.toInfo(record, text);
    if (info) {
      this.deliver(info, () => undefined);
    }
  }

  protected emitAsync(record: LogRecord, text: string, logger: Logger): Promise<void> {
    this.owner = logger;
    const info = this.toInfo(record, text);
    if (!info) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => this.deliver(info, resolve));
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.transport.close?.();
  }

  private deliver(info: TransformableInfo, done: () => void): void {
    if (!this.transport.log) {
      throw new HandlerIOError(`Transport of handler "${this.name}" has no log method`, {
        handler: this.name,
      });
    }
    this.transport.log(info, done);
  }

  // Applies the transport's own format the way a winston logger would
  private toInfo(record: LogRecord, text: string): TransformableInfo | undefined {
    const info: TransformableInfo = {
      ...record.extra,
      level: levelToWinston(record.level),
      message: record.message,
      logger: record.loggerName,
      prefix: record.prefix,
      timestamp: record.createdAt.toISOString(),
      tags: [...record.tags],
      [LEVEL]: levelToWinston(record.level),
      [MESSAGE]: text,
    };
    const format = this.transport.format;
    if (!format) {
      return info;
    }
    const transformed = format.transform(info, format.options);
    if (transformed === false) {
      return undefined;
    }
    return transformed === true ? info : transformed;
  }

  private onTransportError(error: unknown): void {
    const failure = new HandlerIOError(
      `Transport error: ${describeError(error)}`,
      { handler: this.name },
      { cause: error }
    );
    if (this.owner) {
      this.owner.reportHandlerFailure(this, failure);
      return;
    }
    process.stderr.write(`[treelog] Handler "${this.name}" failed: ${failure.message}\n`);
  }
}
