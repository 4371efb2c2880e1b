import type { HandlerOptions } from '../types/handler';
import type { LogRecord } from '../types/record';
import { BaseHandler } from './base-handler';

export interface MemoryEntry {
  record: LogRecord;
  text: string;
}

export interface MemoryHandlerOptions extends HandlerOptions {
  /** Oldest entries are dropped beyond this many. Unbounded by default */
  capacity?: number;
}

/**
 * Keeps rendered records in memory.
 */
export class MemoryHandler extends BaseHandler {
  private buffer: MemoryEntry[] = [];
  private readonly capacity: number;

  constructor(options: MemoryHandlerOptions = {}) {
    super(options);
    this.capacity = options.capacity ?? Infinity;
  }

  get entries(): readonly MemoryEntry[] {
    return this.buffer;
  }

  get records(): LogRecord[] {
    return this.buffer.map(entry => entry.record);
  }

  get lines(): string[] {
    return this.buffer.map(entry => entry.text);
  }

  clear(): void {
    this.buffer = [];
  }

  protected emit(record: LogRecord, text: string): void {
    this.buffer.push({ record, text });
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }
  }
}
