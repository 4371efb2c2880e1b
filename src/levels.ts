import chalk from 'chalk';
import type { ForegroundColorName } from 'chalk';
import { ConfigurationError } from './errors';

/**
 * Anything a caller may pass where a level is expected.
 */
export type LevelLike = LogLevel | number | string;

const DEFAULT_COLOR: ForegroundColorName = 'white';

/**
 * Ordered severity scale. Instances are compared by their integer value, so
 * a level can be checked against another level or against a raw number.
 */
export class LogLevel {
  private static readonly byName = new Map<string, LogLevel>();
  private static readonly byValue = new Map<number, LogLevel>();
  private static readonly colors = new Map<number, ForegroundColorName>();

  static readonly NOTSET = LogLevel.define('NOTSET', 0, 'white');
  static readonly TRACE = LogLevel.define('TRACE', 10, 'blueBright');
  static readonly DEBUG = LogLevel.define('DEBUG', 20, 'cyanBright');
  static readonly INFO = LogLevel.define('INFO', 30, 'greenBright');
  static readonly SUCCESS = LogLevel.define('SUCCESS', 40, 'green');
  static readonly WARNING = LogLevel.define('WARNING', 50, 'yellowBright');
  static readonly FAIL = LogLevel.define('FAIL', 60, 'red');
  static readonly ERROR = LogLevel.define('ERROR', 70, 'redBright');
  static readonly CRITICAL = LogLevel.define('CRITICAL', 80, 'magentaBright');

  // Aliases resolve to the same instance
  static readonly NOTICE = LogLevel.alias('NOTICE', LogLevel.SUCCESS);
  static readonly WARN = LogLevel.alias('WARN', LogLevel.WARNING);
  static readonly FATAL = LogLevel.alias('FATAL', LogLevel.CRITICAL);

  private constructor(
    public readonly name: string,
    public readonly value: number
  ) {}

  private static define(
    name: string,
    value: number,
    color: ForegroundColorName
  ): LogLevel {
    const level = new LogLevel(name, value);
    LogLevel.byName.set(name, level);
    if (!LogLevel.byValue.has(value)) {
      LogLevel.byValue.set(value, level);
    }
    LogLevel.colors.set(value, color);
    return level;
  }

  private static alias(name: string, target: LogLevel): LogLevel {
    LogLevel.byName.set(name, target);
    return target;
  }

  /**
   * Register a new named level. Names are case-insensitive and unique.
   */
  static register(
    name: string,
    value: number,
    color: ForegroundColorName = DEFAULT_COLOR
  ): LogLevel {
    const key = name.trim().toUpperCase();
    if (!key) {
      throw new ConfigurationError('Level name must not be empty');
    }
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(
        `Invalid value for level ${key}: ${value}. Must be a non-negative integer`,
        { name: key, value }
      );
    }
    if (LogLevel.byName.has(key)) {
      throw new ConfigurationError(`Log level ${key} is already registered`, {
        name: key,
      });
    }
    const owner = LogLevel.byValue.get(value);
    if (owner) {
      throw new ConfigurationError(
        `Level value ${value} is already taken by ${owner.name}`,
        { name: key, value }
      );
    }
    return LogLevel.define(key, value, color);
  }

  static get(name: string): LogLevel | undefined {
    return LogLevel.byName.get(name.trim().toUpperCase());
  }

  /**
   * Named level for `value`, or an anonymous `LEVEL_<n>` when none exists.
   */
  static fromValue(value: number): LogLevel {
    return LogLevel.byValue.get(value) ?? new LogLevel(`LEVEL_${value}`, value);
  }

  static resolve(level: LevelLike): LogLevel {
    if (level instanceof LogLevel) {
      return level;
    }
    if (typeof level === 'number') {
      return LogLevel.fromValue(level);
    }
    const named = LogLevel.get(level);
    if (!named) {
      const valid = LogLevel.names().join(', ');
      throw new ConfigurationError(
        `Invalid log level: ${level}. Valid levels: ${valid}`,
        { level }
      );
    }
    return named;
  }

  /**
   * Closed value to color lookup; unknown values fall back to white.
   */
  static colorFor(value: number): ForegroundColorName {
    return LogLevel.colors.get(value) ?? DEFAULT_COLOR;
  }

  /** Canonical levels in ascending order (aliases excluded). */
  static values(): LogLevel[] {
    return Array.from(LogLevel.byValue.values()).sort(
      (a, b) => a.value - b.value
    );
  }

  /** Every registered name, aliases included. */
  static names(): string[] {
    return Array.from(LogLevel.byName.keys());
  }

  get color(): ForegroundColorName {
    return LogLevel.colorFor(this.value);
  }

  paint(text: string): string {
    return chalk[this.color](text);
  }

  compare(other: LogLevel | number): number {
    return this.value - valueOf(other);
  }

  eq(other: LogLevel | number): boolean {
    return this.compare(other) === 0;
  }

  lt(other: LogLevel | number): boolean {
    return this.compare(other) < 0;
  }

  le(other: LogLevel | number): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: LogLevel | number): boolean {
    return this.compare(other) > 0;
  }

  ge(other: LogLevel | number): boolean {
    return this.compare(other) >= 0;
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.name;
  }
}

function valueOf(level: LogLevel | number): number {
  return typeof level === 'number' ? level : level.value;
}
