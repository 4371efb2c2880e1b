import type { LogLevel } from '../levels';

/**
 * One emitted log event. Shared by every handler of a dispatch, so it is
 * never mutated; middleware and propagation derive copies instead.
 */
export interface LogRecord {
  readonly message: string;
  readonly level: LogLevel;
  readonly loggerName: string;
  /** Display prefix; defaults to the logger name */
  readonly prefix: string;
  readonly createdAt: Date;
  readonly parentName?: string;
  /** Logger context merged with call-site extras (call site wins) */
  readonly extra: Readonly<Record<string, unknown>>;
  readonly tags: readonly string[];
}

/**
 * Result of an admitted log call, rendered by the logger's formatter.
 */
export interface LogOutput {
  plain: string;
  decorated: string;
}
