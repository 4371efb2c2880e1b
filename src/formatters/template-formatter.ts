import type { LogRecord } from '../types/record';
import { formatElapsed, formatTimestamp } from '../utils/time';
import { stringifyValue } from '../utils/serialize';
import { BaseFormatter } from './base-formatter';

export const DEFAULT_TEMPLATE =
  '[{time}] {prefix} | {level_name}[{level_value}]: {message}';
export const DEFAULT_TIME_FORMAT = 'DD/MM/YYYY HH:mm:ss';

export interface TemplateFormatterOptions {
  /** Pattern for {time}: YYYY MM DD HH mm ss SSS */
  timeFormat?: string;
  /** Reference point for {elapsed}; defaults to construction time */
  startedAt?: Date;
}

/**
 * Renders `{token}` placeholders. Reserved tokens take precedence over extra
 * keys of the same name; unknown tokens are left as written.
 */
export class TemplateFormatter extends BaseFormatter {
  public readonly template: string;
  public readonly timeFormat: string;
  private readonly startedAt: Date;

  constructor(
    template: string = DEFAULT_TEMPLATE,
    options: TemplateFormatterOptions = {}
  ) {
    super();
    this.template = template;
    this.timeFormat = options.timeFormat ?? DEFAULT_TIME_FORMAT;
    this.startedAt = options.startedAt ?? new Date();
  }

  format(record: LogRecord): string {
    const tokens = this.tokensFor(record);
    return this.template.replace(/\{(\w+)\}/g, (match, key: string) => {
      if (Object.prototype.hasOwnProperty.call(tokens, key)) {
        return tokens[key];
      }
      if (Object.prototype.hasOwnProperty.call(record.extra, key)) {
        return stringifyValue(record.extra[key]);
      }
      return match;
    });
  }

  private tokensFor(record: LogRecord): Record<string, string> {
    const elapsed = record.createdAt.getTime() - this.startedAt.getTime();
    return {
      time: formatTimestamp(record.createdAt, this.timeFormat),
      iso_time: record.createdAt.toISOString(),
      name: record.loggerName,
      prefix: record.prefix || record.loggerName,
      level: record.level.name,
      level_name: record.level.name,
      level_value: String(record.level.value),
      message: record.message,
      parent: record.parentName ?? '',
      tags: record.tags.join(','),
      elapsed: formatElapsed(elapsed),
      elapsed_ms: String(Math.max(0, elapsed)),
    };
  }
}
