import type { Logger } from '../logger';
import type { Filter } from './filter';
import type { Formatter } from './formatter';
import type { LogRecord } from './record';

/**
 * Outcome of offering a record to a handler.
 * - emitted: written before returning
 * - queued: accepted, completes after returning (blocking call met a busy lock)
 * - rejected: the handler's own filters refused it, or the handler is closed
 * - failed: delivery failed and was reported to the logger
 */
export type HandleStatus = 'emitted' | 'queued' | 'rejected' | 'failed';

/**
 * Effectful consumer of records.
 */
export interface Handler {
  readonly name: string;
  readonly filters: readonly Filter[];
  formatter?: Formatter;
  handle(record: LogRecord, logger: Logger): HandleStatus;
  handleAsync(record: LogRecord, logger: Logger): Promise<HandleStatus>;
  close(): void | Promise<void>;
}

export interface HandlerOptions {
  name?: string;
  formatter?: Formatter;
  filters?: Filter[];
}

/**
 * Narrow delivery contract for remote destinations (chat bots, webhooks).
 */
export interface RemoteSender {
  send(destinationId: string, text: string): boolean | Promise<boolean>;
}

/**
 * Narrow compression contract used when retiring rotated files.
 */
export interface Compressor {
  /** Suffix the archive gets, such as `.gz`. File handlers skip indices already archived */
  readonly extension?: string;

  /** Returns the path of the compressed file */
  compress(sourcePath: string): string | Promise<string>;
}
