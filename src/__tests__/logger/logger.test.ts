import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '../../logger';
import { LoggerRegistry } from '../../registry';
import { BaseHandler } from '../../handlers/base-handler';
import { MemoryHandler } from '../../handlers/memory-handler';
import { RemoteHandler } from '../../handlers/remote-handler';
import { TemplateFormatter } from '../../formatters/template-formatter';
import { ModuleFilter, PredicateFilter } from '../../filters/filters';
import { defineMiddleware } from '../../middleware/base-middleware';
import { ConfigurationError, FormatterError, HandlerIOError } from '../../errors';
import { LogLevel } from '../../levels';
import type { Formatter } from '../../types/formatter';
import type { LogRecord } from '../../types/record';
import { createTestRegistry } from '../helpers';

class BrokenHandler extends BaseHandler {
  protected emit(): void {
    throw new Error('disk full');
  }
}

class BrokenFormatter implements Formatter {
  format(): string {
    throw new Error('boom');
  }

  formatDecorated(): string {
    throw new Error('boom');
  }
}

const plain = () => new TemplateFormatter('{message}');

describe('Logger', () => {
  let registry: LoggerRegistry;
  let fallback: string[];
  let memory: MemoryHandler;
  let logger: Logger;

  beforeEach(() => {
    ({ registry, fallback } = createTestRegistry());
    memory = new MemoryHandler({ formatter: plain() });
    logger = registry.createLogger('app', { handlers: [memory], formatter: plain() });
  });

  describe('Construction', () => {
    it('should apply defaults', () => {
      const other = registry.createLogger(' Worker ');

      expect(other.name).toBe('worker');
      expect(other.prefix).toBe('worker');
      expect(other.level).toBe(LogLevel.NOTSET);
      expect(other.enabled).toBe(true);
      expect(other.propagate).toBe(true);
      expect(other.parent).toBe(registry.root);
    });

    it('should reject an empty name', () => {
      expect(() => registry.createLogger('   ')).toThrow('Logger name must not be empty');
    });
  });

  describe('Level gate', () => {
    it('should refuse records below its level', () => {
      logger.setLevel('warning');

      expect(logger.info('quiet')).toBe(false);
      expect(logger.isEnabledFor(LogLevel.INFO)).toBe(false);
      expect(logger.warning('loud')).toEqual({
        plain: 'loud',
        decorated: '\u001b[93mloud\u001b[39m',
      });
      expect(memory.lines).toEqual(['loud']);
    });

    it('should refuse everything while disabled', () => {
      logger.enabled = false;

      expect(logger.critical('ignored')).toBe(false);
      expect(memory.lines).toEqual([]);
    });

    it('should map the shorthand methods to their levels', () => {
      logger.trace('t');
      logger.debug('d');
      logger.success('s');
      logger.warn('w');
      logger.fail('f');
      logger.error('e');
      logger.fatal('x');

      expect(memory.records.map(record => record.level.name)).toEqual([
        'TRACE',
        'DEBUG',
        'SUCCESS',
        'WARNING',
        'FAIL',
        'ERROR',
        'CRITICAL',
      ]);
    });
  });

  describe('Records', () => {
    it('should merge context under call-site extras and copy tags', () => {
      logger.setContext({ service: 'api', user: 'default' });
      logger.addTag('http');
      logger.addTag('http');

      logger.info('served', { user: 'test-user' });
      logger.removeTag('http');

      const [record] = memory.records;
      expect(record.extra).toEqual({ service: 'api', user: 'test-user' });
      expect(record.tags).toEqual(['http']);
      expect(record.loggerName).toBe('app');
      expect(record.parentName).toBe('root');
      expect(logger.tags).toEqual([]);
    });

    it('should manage context', () => {
      logger.setContext({ a: 1 });
      logger.addContext({ b: 2 });
      expect(logger.getContext()).toEqual({ a: 1, b: 2 });

      logger.clearContext();
      expect(logger.getContext()).toEqual({});
    });
  });

  describe('Filters', () => {
    it('should list effective filters from the furthest ancestor down', () => {
      const rootFilter = new PredicateFilter(() => true);
      const parentFilter = new PredicateFilter(() => true);
      const childFilter = new PredicateFilter(() => true);
      registry.root.addFilter(rootFilter);
      const child = registry.getLogger('app.db');
      logger.addFilter(parentFilter);
      child.addFilter(childFilter);

      expect(child.getEffectiveFilters()).toEqual([rootFilter, parentFilter, childFilter]);
    });

    it('should refuse a record any inherited filter rejects', () => {
      logger.addFilter(new ModuleFilter('app'));
      const child = registry.getLogger('app.db');
      const childMemory = new MemoryHandler();
      child.addHandler(childMemory);

      expect(child.info('query')).toBe(false);
      expect(childMemory.lines).toEqual([]);
      expect(memory.lines).toEqual([]);
    });

    it('should report a throwing filter and refuse the record', () => {
      logger.addFilter(
        new PredicateFilter(() => {
          throw new Error('boom');
        })
      );

      expect(logger.info('hello')).toBe(false);
      expect(memory.lines).toEqual(['Filter PredicateFilter raised: boom']);
      expect(memory.records[0].level).toBe(LogLevel.WARNING);
    });
  });

  describe('Middleware', () => {
    it('should run inner steps before handlers and outer steps after', () => {
      const seen: string[] = [];
      logger.addInnerMiddleware(
        defineMiddleware('upper', (record: LogRecord) => ({
          ...record,
          message: record.message.toUpperCase(),
        }))
      );
      logger.addOuterMiddleware(
        defineMiddleware('audit', (record: LogRecord) => {
          seen.push(`${record.message}/${memory.lines.length}`);
          return record;
        })
      );

      expect(logger.info('hello')).toEqual({
        plain: 'HELLO',
        decorated: '\u001b[92mHELLO\u001b[39m',
      });
      expect(memory.lines).toEqual(['HELLO']);
      expect(seen).toEqual(['HELLO/1']);
    });

    it('should stop the record when an inner step rejects it', () => {
      const parentMemory = new MemoryHandler();
      registry.root.addHandler(parentMemory);
      logger.addInnerMiddleware(defineMiddleware('drop', () => null));

      expect(logger.info('hello')).toBe(false);
      expect(memory.lines).toEqual([]);
      expect(parentMemory.lines).toEqual([]);
    });
  });

  describe('Propagation', () => {
    let parentMemory: MemoryHandler;
    let child: Logger;
    let childMemory: MemoryHandler;

    beforeEach(() => {
      parentMemory = memory;
      child = registry.getLogger('app.db');
      childMemory = new MemoryHandler({ formatter: plain() });
      child.addHandler(childMemory);
    });

    it('should offer records to the parent restamped with its identity', () => {
      child.info('query', { table: 'users' });

      expect(childMemory.records[0]).toMatchObject({
        loggerName: 'app.db',
        prefix: 'app.db',
        parentName: 'app',
      });
      expect(parentMemory.records).toHaveLength(1);
      expect(parentMemory.records[0]).toMatchObject({
        message: 'query',
        loggerName: 'app',
        prefix: 'app',
        parentName: 'root',
        extra: { table: 'users' },
      });
    });

    it('should keep records local when propagation is off', () => {
      child.propagate = false;

      child.info('query');

      expect(childMemory.lines).toEqual(['query']);
      expect(parentMemory.lines).toEqual([]);
    });

    it('should apply the parent gate without stopping further propagation', () => {
      const rootMemory = new MemoryHandler({ formatter: plain() });
      registry.root.addHandler(rootMemory);
      logger.setLevel('error');

      child.info('query');

      expect(childMemory.lines).toEqual(['query']);
      expect(parentMemory.lines).toEqual([]);
      expect(rootMemory.lines).toEqual(['query']);
    });

    it('should give ancestors the record before the child inner middleware ran', () => {
      child.addInnerMiddleware(
        defineMiddleware('mark', (record: LogRecord) => ({
          ...record,
          message: `${record.message}!`,
        }))
      );

      child.info('query');

      expect(childMemory.lines).toEqual(['query!']);
      expect(parentMemory.lines).toEqual(['query']);
    });

    it('should materialise ancestors for dotted names', () => {
      expect(child.parent).toBe(logger);
      expect(logger.getChild('db')).toBe(child);
      expect(logger.children).toEqual([child]);
    });

    it('should refuse a parent that would create a cycle', () => {
      expect(() => logger.setParent(child)).toThrow(ConfigurationError);
    });
  });

  describe('Failure isolation', () => {
    it('should keep delivering to healthy handlers and report each failure', () => {
      const broken = new BrokenHandler({ name: 'broken' });
      logger.removeHandler(memory);
      logger.addHandler(broken);
      logger.addHandler(memory);

      for (let i = 0; i < 10; i++) {
        expect(logger.info(`message ${i}`)).not.toBe(false);
      }

      const normal = memory.records.filter(record => record.level === LogLevel.INFO);
      const diagnostics = memory.records.filter(record => record.level === LogLevel.ERROR);
      expect(normal.map(record => record.message)).toEqual(
        Array.from({ length: 10 }, (_, i) => `message ${i}`)
      );
      expect(diagnostics).toHaveLength(10);
      expect(diagnostics[0].message).toBe('Handler "broken" failed: disk full');
      expect(diagnostics[0].extra.error).toBeInstanceOf(HandlerIOError);
      expect(diagnostics[0].extra.error_type).toBe('Error');
      expect(diagnostics[0].extra.failed_message).toBe('message 0');
      expect(fallback).toEqual([]);
    });

    it('should send a failure during a diagnostic to the fallback stream', () => {
      logger.removeHandler(memory);
      logger.addHandler(new BrokenHandler({ name: 'first' }));
      logger.addHandler(new BrokenHandler({ name: 'second' }));

      expect(logger.info('hello')).not.toBe(false);

      expect(fallback).toEqual([
        '[treelog] Handler "second" failed: disk full\n',
        '[treelog] Handler "first" failed: disk full\n',
      ]);
    });

    it('should return false and report when the logger formatter throws', () => {
      logger.formatter = new BrokenFormatter();

      expect(logger.info('hi')).toBe(false);

      expect(memory.lines).toEqual(['hi', 'Formatter BrokenFormatter failed: boom']);
      expect(memory.records[1].level).toBe(LogLevel.ERROR);
      expect(memory.records[1].extra.error).toBeInstanceOf(FormatterError);
      expect(memory.records[1].extra.failed_message).toBe('hi');
      expect(fallback).toEqual([]);
    });

    it('should resolve to false when the logger formatter throws in awaited mode', async () => {
      logger.formatter = new BrokenFormatter();

      await expect(logger.logAsync('hi')).resolves.toBe(false);
      expect(memory.lines).toEqual(['hi', 'Formatter BrokenFormatter failed: boom']);
    });

    it('should find handlers by name and remove them', () => {
      expect(logger.getHandler(memory.name)).toBe(memory);
      expect(logger.removeHandler(memory.name)).toBe(true);
      expect(logger.handlers).toEqual([]);
    });
  });

  describe('Exceptions', () => {
    it('should attach exception details', () => {
      logger.exception('parse failed', new TypeError('bad input'), {
        extra: { file: 'a.json' },
      });

      const [record] = memory.records;
      expect(record.level).toBe(LogLevel.ERROR);
      expect(record.extra.file).toBe('a.json');
      expect(record.extra.exception_type).toBe('TypeError');
      expect(record.extra.exception_message).toBe('bad input');
      expect(String(record.extra.stack_trace)).toContain('TypeError: bad input');
    });

    it('should log and rethrow from a wrapped function', () => {
      function parse(): never {
        throw new Error('nope');
      }

      expect(() => logger.catchExceptions(parse)).toThrow('nope');
      expect(memory.lines).toEqual(['Exception in parse']);
    });

    it('should log and rethrow from a wrapped async function', async () => {
      await expect(
        logger.catchExceptionsAsync(async () => {
          throw new Error('nope');
        }, 'async failure')
      ).rejects.toThrow('nope');
      expect(memory.lines).toEqual(['async failure']);
    });
  });

  describe('Scopes and timers', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should bracket a block with start and end records', () => {
      expect(logger.scope('job', () => 42)).toBe(42);

      expect(memory.lines).toEqual(['Start: job', 'End: job']);
    });

    it('should log a failing block at ERROR and rethrow', () => {
      expect(() =>
        logger.scope('job', () => {
          throw new Error('nope');
        })
      ).toThrow('nope');

      expect(memory.lines).toEqual(['Start: job', 'Error in block: job - nope', 'End: job']);
      expect(memory.records[1].level).toBe(LogLevel.ERROR);
    });

    it('should bracket an async block', async () => {
      await expect(logger.scopeAsync('sync', async () => 'done')).resolves.toBe('done');

      expect(memory.lines).toEqual(['Start: sync', 'End: sync']);
    });

    it('should log the duration of a timer at DEBUG', () => {
      vi.useFakeTimers();
      const timer = logger.time('load');
      vi.advanceTimersByTime(25);

      expect(timer.elapsed()).toBe(25);
      timer.end();
      timer.end();

      expect(memory.lines).toEqual(['load completed']);
      expect(memory.records[0].level).toBe(LogLevel.DEBUG);
      expect(memory.records[0].extra.duration).toBe(25);
    });
  });

  describe('Awaited mode', () => {
    it('should wait for asynchronous handlers and propagate', async () => {
      const send = vi.fn(async () => true);
      const child = registry.getLogger('app.http');
      child.addHandler(new RemoteHandler({ sender: { send }, destination: 'ops' }));

      child.formatter = plain();

      const output = await child.logAsync('request', 'info');

      expect(output).toEqual({
        plain: 'request',
        decorated: '\u001b[92mrequest\u001b[39m',
      });
      expect(send).toHaveBeenCalledTimes(1);
      expect(memory.lines).toEqual(['request']);
    });

    it('should refuse in awaited mode the same way', async () => {
      logger.setLevel('error');

      await expect(logger.logAsync('quiet', LogLevel.INFO)).resolves.toBe(false);
    });
  });

  describe('Closing', () => {
    it('should close and drop its own handlers', async () => {
      await logger.close();

      expect(memory.isClosed).toBe(true);
      expect(logger.handlers).toEqual([]);
    });
  });
});
