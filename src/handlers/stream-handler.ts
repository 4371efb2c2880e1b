import { LogLevel } from '../levels';
import type { LevelLike } from '../levels';
import type { Formatter } from '../types/formatter';
import type { HandlerOptions } from '../types/handler';
import type { LogRecord } from '../types/record';
import { BaseHandler } from './base-handler';

/**
 * Minimal writable surface; process.stdout and any stream.Writable fit.
 */
export interface TextSink {
  write(text: string): unknown;
}

export interface StreamHandlerOptions extends HandlerOptions {
  /** Write decorated (colored) text. Defaults to true */
  colors?: boolean;
  /** Records at or above this level go to `stderr`. Defaults to ERROR */
  errorLevel?: LevelLike;
  stdout?: TextSink;
  stderr?: TextSink;
}

export class StreamHandler extends BaseHandler {
  public readonly colors: boolean;
  public readonly errorLevel: LogLevel;
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;

  constructor(options: StreamHandlerOptions = {}) {
    super(options);
    this.colors = options.colors !== false;
    this.errorLevel = LogLevel.resolve(options.errorLevel ?? LogLevel.ERROR);
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  protected render(record: LogRecord, formatter: Formatter): string {
    return this.colors ? formatter.formatDecorated(record) : formatter.format(record);
  }

  protected emit(record: LogRecord, text: string): void {
    const target = record.level.ge(this.errorLevel) ? this.stderr : this.stdout;
    target.write(`${text}\n`);
  }
}
