import type { Logger } from '../logger';
import type { LogRecord } from './record';

export type MiddlewareStage = 'inner' | 'outer';

/**
 * Pre-dispatch (inner) or post-dispatch (outer) processing step.
 * Returns the record for the next step, or null to reject it.
 */
export interface Middleware {
  readonly name: string;
  readonly priority: number;
  enabled?: boolean;
  process(record: LogRecord, logger: Logger): LogRecord | null;
  /** Awaited variant; `process` is used when absent */
  processAsync?(record: LogRecord, logger: Logger): Promise<LogRecord | null>;
}
