import { LogLevel } from '../levels';
import type { LevelLike } from '../levels';
import type { Filter } from '../types/filter';
import type { LogRecord } from '../types/record';
import { secondsOfDay } from '../utils/time';
import type { TimeOfDay } from '../utils/time';
import { ConfigurationError } from '../errors';

/**
 * Admits records at or above a threshold.
 */
export class LevelFilter implements Filter {
  public readonly threshold: LogLevel;

  constructor(threshold: LevelLike = LogLevel.NOTSET) {
    this.threshold = LogLevel.resolve(threshold);
  }

  admit(record: LogRecord): boolean {
    return record.level.ge(this.threshold);
  }
}

export interface RegexFilterOptions {
  invert?: boolean;
}

/**
 * Pattern search over the message. `invert` negates the match.
 */
export class RegexFilter implements Filter {
  public readonly pattern: RegExp;
  public readonly invert: boolean;

  constructor(pattern: string | RegExp, options: RegexFilterOptions = {}) {
    try {
      // g and y make RegExp#test stateful between calls
      this.pattern =
        typeof pattern === 'string'
          ? new RegExp(pattern)
          : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    } catch (error) {
      throw new ConfigurationError(`Invalid regex pattern: ${String(pattern)}`, {
        pattern: String(pattern),
      }, { cause: error });
    }
    this.invert = options.invert ?? false;
  }

  admit(record: LogRecord): boolean {
    const found = this.pattern.test(record.message);
    return this.invert ? !found : found;
  }
}

/**
 * Admits records whose local time of day falls inside [start, end].
 * When start > end the window wraps past midnight.
 */
export class TimeFilter implements Filter {
  private readonly start: number;
  private readonly end: number;

  constructor(start: string | TimeOfDay, end: string | TimeOfDay) {
    try {
      this.start = secondsOfDay(start);
      this.end = secondsOfDay(end);
    } catch (error) {
      throw new ConfigurationError(
        error instanceof Error ? error.message : 'Invalid time window',
        { start, end }
      );
    }
  }

  admit(record: LogRecord): boolean {
    const at = record.createdAt;
    const time = at.getHours() * 3600 + at.getMinutes() * 60 + at.getSeconds();
    if (this.start <= this.end) {
      return time >= this.start && time <= this.end;
    }
    return time >= this.start || time <= this.end;
  }
}

/**
 * Exact match against the (case-normalised) logger name.
 */
export class ModuleFilter implements Filter {
  public readonly moduleName: string;

  constructor(moduleName: string) {
    this.moduleName = moduleName.trim().toLowerCase();
  }

  admit(record: LogRecord): boolean {
    return record.loggerName === this.moduleName;
  }
}

export type CompositeMode = 'AND' | 'OR';

/**
 * AND / OR over child filters in list order. An empty list admits; an
 * unrecognised mode rejects everything.
 */
export class CompositeFilter implements Filter {
  public readonly filters: readonly Filter[];
  public readonly mode: string;

  constructor(filters: Filter[], mode: CompositeMode | string = 'AND') {
    this.filters = [...filters];
    this.mode = mode.toUpperCase();
  }

  admit(record: LogRecord): boolean {
    if (this.mode === 'AND') {
      return this.filters.every(filter => filter.admit(record));
    }
    if (this.mode === 'OR') {
      return this.filters.length === 0
        ? true
        : this.filters.some(filter => filter.admit(record));
    }
    return false;
  }
}

/**
 * Wraps a plain predicate function.
 */
export class PredicateFilter implements Filter {
  constructor(private readonly predicate: (record: LogRecord) => boolean) {}

  admit(record: LogRecord): boolean {
    return this.predicate(record);
  }
}
