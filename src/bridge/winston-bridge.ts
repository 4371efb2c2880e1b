import Transport from 'winston-transport';
import type { TransportStreamOptions } from 'winston-transport';
import { LogLevel } from '../levels';
import type { Logger } from '../logger';

const WINSTON_LEVELS: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARNING,
  info: LogLevel.INFO,
  http: LogLevel.INFO,
  verbose: LogLevel.DEBUG,
  debug: LogLevel.DEBUG,
  silly: LogLevel.TRACE,
};

/**
 * Map a winston npm level name onto LogLevel. Unknown names map to INFO.
 */
export function levelFromWinston(level: string): LogLevel {
  return WINSTON_LEVELS[level.toLowerCase()] ?? LogLevel.get(level) ?? LogLevel.INFO;
}

export interface LoggerTransportOptions extends TransportStreamOptions {
  logger: Logger;
}

/**
 * winston transport that feeds an existing winston logger into a logger of
 * this library, so code written against winston can migrate gradually.
 */
export class LoggerTransport extends Transport {
  private readonly target: Logger;

  constructor(opts: LoggerTransportOptions) {
    super(opts);
    this.target = opts.logger;
  }

  log(info: Record<string | symbol, unknown>, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const { level, message, ...rest } = info;
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(rest)) {
      if (key !== 'timestamp') {
        extra[key] = value;
      }
    }

    this.target.log(
      typeof message === 'string' ? message : String(message),
      levelFromWinston(typeof level === 'string' ? level : 'info'),
      extra
    );
    callback();
  }
}
