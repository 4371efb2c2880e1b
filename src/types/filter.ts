import type { LogRecord } from './record';

/**
 * Admission predicate over a record. Must not modify the record.
 */
export interface Filter {
  admit(record: LogRecord): boolean;
}
