import type { LogRecord } from './record';

/**
 * Pure text rendering of a record.
 */
export interface Formatter {
  format(record: LogRecord): string;
  /** Level color prefix + plain text + reset */
  formatDecorated(record: LogRecord): string;
}
