import { HandlerIOError } from '../errors';
import type { HandlerOptions, RemoteSender } from '../types/handler';
import type { LogRecord } from '../types/record';
import { BaseHandler } from './base-handler';

export interface RemoteHandlerOptions extends HandlerOptions {
  sender: RemoteSender;
  destination: string;
}

/**
 * Delivers formatted records to a remote destination (chat, webhook) through
 * a RemoteSender. Delivery is best effort: a `false` result is reported as a
 * handler failure and never retried.
 */
export class RemoteHandler extends BaseHandler {
  public readonly destination: string;
  private readonly sender: RemoteSender;

  constructor(options: RemoteHandlerOptions) {
    super(options);
    this.sender = options.sender;
    this.destination = options.destination;
  }

  protected emit(_record: LogRecord, text: string): void | Promise<void> {
    const result = this.sender.send(this.destination, text);
    if (result instanceof Promise) {
      return result.then(delivered => this.check(delivered));
    }
    this.check(result);
  }

  private check(delivered: boolean): void {
    if (!delivered) {
      throw new HandlerIOError(
        `Remote delivery to ${this.destination} was refused`,
        { handler: this.name, destination: this.destination }
      );
    }
  }
}
