import { describe, it, expect, beforeEach } from 'vitest';
import { StreamHandler } from '../../handlers/stream-handler';
import { MemoryHandler } from '../../handlers/memory-handler';
import { TemplateFormatter } from '../../formatters/template-formatter';
import { LevelFilter } from '../../filters/filters';
import { LogLevel } from '../../levels';
import type { Logger } from '../../logger';
import { createTestRegistry, makeRecord } from '../helpers';

describe('StreamHandler', () => {
  let out: string[];
  let err: string[];
  let logger: Logger;

  const sinks = () => ({
    stdout: { write: (text: string) => out.push(text) },
    stderr: { write: (text: string) => err.push(text) },
  });

  beforeEach(() => {
    out = [];
    err = [];
    logger = createTestRegistry().registry.createLogger('app', {
      formatter: new TemplateFormatter('{level}: {message}'),
    });
  });

  it('should write colored lines with the logger formatter by default', () => {
    const handler = new StreamHandler(sinks());

    expect(handler.handle(makeRecord(), logger)).toBe('emitted');

    expect(out).toEqual(['\u001b[92mINFO: hello\u001b[39m\n']);
    expect(err).toEqual([]);
  });

  it('should send records at or above the error level to stderr', () => {
    const handler = new StreamHandler({ ...sinks(), colors: false, errorLevel: 'warning' });

    handler.handle(makeRecord({ level: LogLevel.INFO }), logger);
    handler.handle(makeRecord({ level: LogLevel.WARNING, message: 'careful' }), logger);

    expect(out).toEqual(['INFO: hello\n']);
    expect(err).toEqual(['WARNING: careful\n']);
  });

  it('should prefer its own formatter', () => {
    const handler = new StreamHandler({
      ...sinks(),
      colors: false,
      formatter: new TemplateFormatter('{prefix} {message}'),
    });

    handler.handle(makeRecord(), logger);

    expect(out).toEqual(['APP hello\n']);
  });

  it('should apply its own filters', () => {
    const handler = new StreamHandler({
      ...sinks(),
      filters: [new LevelFilter(LogLevel.ERROR)],
    });

    expect(handler.handle(makeRecord(), logger)).toBe('rejected');
    expect(out).toEqual([]);
  });

  it('should report a failing sink without throwing', () => {
    const memory = new MemoryHandler({ formatter: new TemplateFormatter('{message}') });
    logger.addHandler(memory);
    const handler = new StreamHandler({
      name: 'console',
      stdout: {
        write: () => {
          throw new Error('EPIPE');
        },
      },
    });

    expect(handler.handle(makeRecord(), logger)).toBe('failed');
    expect(memory.lines).toEqual(['Handler "console" failed: EPIPE']);
  });

  it('should reject records once closed', async () => {
    const handler = new StreamHandler(sinks());

    await handler.close();

    expect(handler.isClosed).toBe(true);
    expect(handler.handle(makeRecord(), logger)).toBe('rejected');
  });
});
