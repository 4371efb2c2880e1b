import type { Formatter } from '../types/formatter';
import type { LogRecord } from '../types/record';

/**
 * Field set shared by every structured projection.
 */
export interface RecordFields {
  time: string;
  name: string;
  prefix: string;
  level: string;
  level_value: number;
  message: string;
  parent: string | null;
  tags: string[];
  extra: Record<string, unknown>;
}

export const RECORD_FIELD_NAMES = [
  'time',
  'name',
  'prefix',
  'level',
  'level_value',
  'message',
  'parent',
  'tags',
  'extra',
] as const satisfies readonly (keyof RecordFields)[];

export function recordFields(record: LogRecord): RecordFields {
  return {
    time: record.createdAt.toISOString(),
    name: record.loggerName,
    prefix: record.prefix || record.loggerName,
    level: record.level.name,
    level_value: record.level.value,
    message: record.message,
    parent: record.parentName ?? null,
    tags: [...record.tags],
    extra: { ...record.extra },
  };
}

export abstract class BaseFormatter implements Formatter {
  abstract format(record: LogRecord): string;

  formatDecorated(record: LogRecord): string {
    return record.level.paint(this.format(record));
  }
}
