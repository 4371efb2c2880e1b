import {
  ConfigurationError,
  FilterEvaluationError,
  FormatterError,
  HandlerIOError,
  LoggingError,
  MiddlewareError,
  describeError,
  errorTypeOf,
} from './errors';
import { TemplateFormatter } from './formatters/template-formatter';
import { LogLevel } from './levels';
import type { LevelLike } from './levels';
import { MiddlewareChain } from './middleware/MiddlewareChain';
import type { LoggerRegistry } from './registry';
import type { Filter } from './types/filter';
import type { Formatter } from './types/formatter';
import type { Handler } from './types/handler';
import type {
  ExceptionOptions,
  LoggerOptions,
  ScopeOptions,
  Timer,
} from './types/logger';
import type { Middleware } from './types/middleware';
import type { LogOutput, LogRecord } from './types/record';

export const ROOT_LOGGER_NAME = 'root';
export const ROOT_LOGGER_PREFIX = 'ROOT';

export type LogExtra = Record<string, unknown>;

export function normalizeLoggerName(name: string): string {
  const normalized = name.trim().toLowerCase();
  if (!normalized) {
    throw new ConfigurationError('Logger name must not be empty');
  }
  return normalized;
}

/**
 * A named node of the logger tree.
 *
 * A call is refused early when the logger is disabled or the level is below
 * the logger's own. Admitted records pass the effective filters (furthest
 * ancestor first), the inner middleware, every handler, the outer middleware,
 * and are then offered to the parent when `propagate` is set.
 *
 * Handler, filter and middleware failures never escape a log call. They are
 * reported as diagnostic records through the same logger.
 */
export class Logger {
  public readonly name: string;
  public prefix: string;
  public enabled: boolean;
  public propagate: boolean;
  public formatter: Formatter;

  private currentLevel: LogLevel;
  private parentLogger: Logger | null = null;
  private readonly childLoggers = new Set<Logger>();
  private handlerList: Handler[];
  private filterList: Filter[];
  private readonly innerChain: MiddlewareChain;
  private readonly outerChain: MiddlewareChain;
  private context: LogExtra;
  private tagList: string[];
  private readonly activeTimers = new Map<string, number>();

  constructor(
    name: string,
    private readonly registry: LoggerRegistry,
    options: LoggerOptions = {}
  ) {
    this.name = normalizeLoggerName(name);
    this.prefix = options.prefix ?? this.name;
    this.enabled = options.enabled ?? true;
    this.propagate = options.propagate ?? true;
    this.formatter = options.formatter ?? new TemplateFormatter();
    this.currentLevel = LogLevel.resolve(options.level ?? LogLevel.NOTSET);
    this.handlerList = [...(options.handlers ?? [])];
    this.filterList = [...(options.filters ?? [])];
    this.innerChain = new MiddlewareChain('inner', options.innerMiddleware);
    this.outerChain = new MiddlewareChain('outer', options.outerMiddleware);
    this.context = { ...options.context };
    this.tagList = [...new Set(options.tags ?? [])];
    this.setParent(options.parent ?? null);
  }

  // Tree

  get parent(): Logger | null {
    return this.parentLogger;
  }

  get children(): Logger[] {
    return Array.from(this.childLoggers);
  }

  setParent(parent: Logger | null): void {
    for (let node = parent; node; node = node.parentLogger) {
      if (node === this) {
        throw new ConfigurationError(
          `Setting ${parent?.name} as parent of ${this.name} would create a cycle`,
          { logger: this.name, parent: parent?.name }
        );
      }
    }
    this.parentLogger?.childLoggers.delete(this);
    this.parentLogger = parent;
    parent?.childLoggers.add(this);
  }

  /**
   * Get or create `<name>.<suffix>` through the owning registry.
   */
  getChild(suffix: string): Logger {
    const name =
      this.name === ROOT_LOGGER_NAME ? suffix : `${this.name}.${suffix}`;
    return this.registry.getLogger(name);
  }

  // Level

  get level(): LogLevel {
    return this.currentLevel;
  }

  setLevel(level: LevelLike): void {
    this.currentLevel = LogLevel.resolve(level);
  }

  isEnabledFor(level: LevelLike): boolean {
    return this.enabled && !LogLevel.resolve(level).lt(this.currentLevel);
  }

  // Handlers, filters and middleware (copy-on-write)

  get handlers(): readonly Handler[] {
    return this.handlerList;
  }

  addHandler(handler: Handler): void {
    this.handlerList = [...this.handlerList, handler];
  }

  removeHandler(handler: Handler | string): boolean {
    const next = this.handlerList.filter(h =>
      typeof handler === 'string' ? h.name !== handler : h !== handler
    );
    const removed = next.length !== this.handlerList.length;
    this.handlerList = next;
    return removed;
  }

  getHandler(name: string): Handler | undefined {
    return this.handlerList.find(handler => handler.name === name);
  }

  get filters(): readonly Filter[] {
    return this.filterList;
  }

  addFilter(filter: Filter): void {
    this.filterList = [...this.filterList, filter];
  }

  removeFilter(filter: Filter): boolean {
    const next = this.filterList.filter(f => f !== filter);
    const removed = next.length !== this.filterList.length;
    this.filterList = next;
    return removed;
  }

  /**
   * Own filters plus every ancestor's, furthest ancestor first.
   */
  getEffectiveFilters(): Filter[] {
    const lineage: Logger[] = [];
    for (let node: Logger | null = this; node; node = node.parentLogger) {
      lineage.unshift(node);
    }
    return lineage.flatMap(node => node.filterList);
  }

  get innerMiddleware(): MiddlewareChain {
    return this.innerChain;
  }

  get outerMiddleware(): MiddlewareChain {
    return this.outerChain;
  }

  addInnerMiddleware(middleware: Middleware): void {
    this.innerChain.add(middleware);
  }

  addOuterMiddleware(middleware: Middleware): void {
    this.outerChain.add(middleware);
  }

  // Context and tags

  setContext(context: LogExtra): void {
    this.context = { ...context };
  }

  addContext(values: LogExtra): void {
    this.context = { ...this.context, ...values };
  }

  getContext(): LogExtra {
    return { ...this.context };
  }

  clearContext(): void {
    this.context = {};
  }

  get tags(): readonly string[] {
    return this.tagList;
  }

  addTag(tag: string): void {
    if (!this.tagList.includes(tag)) {
      this.tagList = [...this.tagList, tag];
    }
  }

  removeTag(tag: string): boolean {
    const next = this.tagList.filter(t => t !== tag);
    const removed = next.length !== this.tagList.length;
    this.tagList = next;
    return removed;
  }

  // Logging

  /**
   * Blocking mode. Returns the rendered record, or false when the call was
   * refused by the level gate, a filter or an inner middleware step, or when
   * the logger's formatter failed to render it.
   */
  log(
    message: string,
    level: LevelLike = LogLevel.INFO,
    extra: LogExtra = {}
  ): LogOutput | false {
    const resolved = LogLevel.resolve(level);
    if (!this.isEnabledFor(resolved)) {
      return false;
    }
    const record = this.createRecord(message, resolved, extra);
    if (!this.admits(record)) {
      return false;
    }
    const processed = this.innerChain.run(record, this);
    if (processed === null) {
      return false;
    }
    this.emit(processed);
    this.outerChain.run(processed, this);

    for (let node: Logger = this; node.propagate; ) {
      const parent = node.parentLogger;
      if (!parent) {
        break;
      }
      parent.receive(parent.restamp(record));
      node = parent;
    }
    return this.render(processed);
  }

  /**
   * Awaited mode. Each handler and middleware step is awaited in order.
   */
  async logAsync(
    message: string,
    level: LevelLike = LogLevel.INFO,
    extra: LogExtra = {}
  ): Promise<LogOutput | false> {
    const resolved = LogLevel.resolve(level);
    if (!this.isEnabledFor(resolved)) {
      return false;
    }
    const record = this.createRecord(message, resolved, extra);
    if (!this.admits(record)) {
      return false;
    }
    const processed = await this.innerChain.runAsync(record, this);
    if (processed === null) {
      return false;
    }
    await this.emitAsync(processed);
    await this.outerChain.runAsync(processed, this);

    for (let node: Logger = this; node.propagate; ) {
      const parent = node.parentLogger;
      if (!parent) {
        break;
      }
      await parent.receiveAsync(parent.restamp(record));
      node = parent;
    }
    return this.render(processed);
  }

  trace(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.TRACE, extra);
  }

  debug(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.DEBUG, extra);
  }

  info(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.INFO, extra);
  }

  success(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.SUCCESS, extra);
  }

  warning(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.WARNING, extra);
  }

  warn(message: string, extra?: LogExtra): LogOutput | false {
    return this.warning(message, extra);
  }

  fail(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.FAIL, extra);
  }

  error(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.ERROR, extra);
  }

  critical(message: string, extra?: LogExtra): LogOutput | false {
    return this.log(message, LogLevel.CRITICAL, extra);
  }

  fatal(message: string, extra?: LogExtra): LogOutput | false {
    return this.critical(message, extra);
  }

  /**
   * Log `error` with its type, message and stack attached as extras.
   */
  exception(
    message: string,
    error: unknown,
    options: ExceptionOptions = {}
  ): LogOutput | false {
    return this.log(message, options.level ?? LogLevel.ERROR, {
      ...options.extra,
      ...exceptionExtras(error),
    });
  }

  /**
   * Run `fn`, logging and rethrowing anything it throws.
   */
  catchExceptions<T>(
    fn: () => T,
    message = `Exception in ${fn.name || 'anonymous function'}`,
    options: ExceptionOptions = {}
  ): T {
    try {
      return fn();
    } catch (error) {
      this.exception(message, error, options);
      throw error;
    }
  }

  async catchExceptionsAsync<T>(
    fn: () => Promise<T>,
    message = `Exception in ${fn.name || 'anonymous function'}`,
    options: ExceptionOptions = {}
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      await this.logAsync(message, options.level ?? LogLevel.ERROR, {
        ...options.extra,
        ...exceptionExtras(error),
      });
      throw error;
    }
  }

  /**
   * Bracket `block` with start and end records; failures are logged at ERROR
   * and rethrown.
   */
  scope<T>(message: string, block: () => T, options: ScopeOptions = {}): T {
    const level = options.level ?? LogLevel.INFO;
    this.log(options.startMessage ?? `Start: ${message}`, level);
    try {
      return block();
    } catch (error) {
      this.log(
        `Error in block: ${message} - ${describeError(error)}`,
        LogLevel.ERROR,
        exceptionExtras(error)
      );
      throw error;
    } finally {
      this.log(options.endMessage ?? `End: ${message}`, level);
    }
  }

  async scopeAsync<T>(
    message: string,
    block: () => Promise<T>,
    options: ScopeOptions = {}
  ): Promise<T> {
    const level = options.level ?? LogLevel.INFO;
    await this.logAsync(options.startMessage ?? `Start: ${message}`, level);
    try {
      return await block();
    } catch (error) {
      await this.logAsync(
        `Error in block: ${message} - ${describeError(error)}`,
        LogLevel.ERROR,
        exceptionExtras(error)
      );
      throw error;
    } finally {
      await this.logAsync(options.endMessage ?? `End: ${message}`, level);
    }
  }

  // Performance timing
  time(label: string): Timer {
    const start = Date.now();
    this.activeTimers.set(label, start);

    return {
      end: () => {
        const startTime = this.activeTimers.get(label);
        if (startTime !== undefined) {
          const duration = Date.now() - startTime;
          this.activeTimers.delete(label);
          this.log(`${label} completed`, LogLevel.DEBUG, { duration });
        }
      },
      elapsed: () => {
        const startTime = this.activeTimers.get(label);
        return startTime !== undefined ? Date.now() - startTime : 0;
      },
    };
  }

  /**
   * Close this logger's own handlers.
   */
  async close(): Promise<void> {
    const handlers = this.handlerList;
    this.handlerList = [];
    await Promise.all(handlers.map(handler => handler.close()));
  }

  // Failure reporting

  reportHandlerFailure(handler: Handler, error: unknown, record?: LogRecord): void {
    const failure =
      error instanceof HandlerIOError
        ? error
        : new HandlerIOError(
            describeError(error) ?? 'unknown error',
            { handler: handler.name },
            { cause: error }
          );
    this.report(
      LogLevel.ERROR,
      `Handler "${handler.name}" failed: ${failure.message}`,
      failure,
      error,
      record,
      handler
    );
  }

  reportFilterFailure(
    filter: Filter,
    error: unknown,
    record: LogRecord,
    handler?: Handler
  ): void {
    const kind = filter.constructor.name || 'Filter';
    const failure = new FilterEvaluationError(
      `${kind} raised: ${describeError(error) ?? 'unknown error'}`,
      { filter: kind, handler: handler?.name },
      { cause: error }
    );
    this.report(
      LogLevel.WARNING,
      `Filter ${failure.message}`,
      failure,
      error,
      record,
      handler
    );
  }

  reportMiddlewareFailure(
    middleware: Middleware,
    error: unknown,
    record: LogRecord
  ): void {
    const failure = new MiddlewareError(
      describeError(error) ?? 'unknown error',
      { middleware: middleware.name },
      { cause: error }
    );
    this.report(
      LogLevel.WARNING,
      `Middleware "${middleware.name}" failed: ${failure.message}`,
      failure,
      error,
      record
    );
  }

  reportFormatterFailure(error: unknown, record: LogRecord): void {
    const kind = this.formatter.constructor.name || 'Formatter';
    const failure = new FormatterError(
      describeError(error) ?? 'unknown error',
      { formatter: kind, logger: this.name },
      { cause: error }
    );
    this.report(
      LogLevel.ERROR,
      `Formatter ${kind} failed: ${failure.message}`,
      failure,
      error,
      record
    );
  }

  // Internals

  private createRecord(
    message: string,
    level: LogLevel,
    extra: LogExtra
  ): LogRecord {
    return {
      message,
      level,
      loggerName: this.name,
      prefix: this.prefix,
      createdAt: new Date(),
      parentName: this.parentLogger?.name,
      extra: { ...this.context, ...extra },
      tags: [...this.tagList],
    };
  }

  private restamp(record: LogRecord): LogRecord {
    return {
      ...record,
      loggerName: this.name,
      prefix: this.prefix,
      parentName: this.parentLogger?.name,
    };
  }

  private render(record: LogRecord): LogOutput | false {
    try {
      return {
        plain: this.formatter.format(record),
        decorated: this.formatter.formatDecorated(record),
      };
    } catch (error) {
      this.reportFormatterFailure(error, record);
      return false;
    }
  }

  private admits(record: LogRecord): boolean {
    for (const filter of this.getEffectiveFilters()) {
      try {
        if (!filter.admit(record)) {
          return false;
        }
      } catch (error) {
        this.reportFilterFailure(filter, error, record);
        return false;
      }
    }
    return true;
  }

  // A record propagated from a descendant: own gate, own handlers
  private receive(record: LogRecord): void {
    if (!this.isEnabledFor(record.level) || !this.admits(record)) {
      return;
    }
    const processed = this.innerChain.run(record, this);
    if (processed === null) {
      return;
    }
    this.emit(processed);
    this.outerChain.run(processed, this);
  }

  private async receiveAsync(record: LogRecord): Promise<void> {
    if (!this.isEnabledFor(record.level) || !this.admits(record)) {
      return;
    }
    const processed = await this.innerChain.runAsync(record, this);
    if (processed === null) {
      return;
    }
    await this.emitAsync(processed);
    await this.outerChain.runAsync(processed, this);
  }

  private emit(record: LogRecord, excluded?: Handler): void {
    for (const handler of this.handlerList) {
      if (handler === excluded) {
        continue;
      }
      try {
        handler.handle(record, this);
      } catch (error) {
        this.reportHandlerFailure(handler, error, record);
      }
    }
  }

  private async emitAsync(record: LogRecord): Promise<void> {
    for (const handler of this.handlerList) {
      try {
        await handler.handleAsync(record, this);
      } catch (error) {
        this.reportHandlerFailure(handler, error, record);
      }
    }
  }

  /**
   * Dispatch a diagnostic record: level gates and handler filters apply,
   * logger filters and middleware do not, and the failing handler is
   * skipped. A failure while a diagnostic is in flight goes to the
   * registry's fallback stream instead.
   */
  private report(
    level: LogLevel,
    message: string,
    failure: LoggingError,
    original: unknown,
    record: LogRecord | undefined,
    excluded?: Handler
  ): void {
    const registry = this.registry;
    if (registry.diagnosticDepth > 0 || (record && registry.isDiagnostic(record))) {
      registry.writeFallback(message);
      return;
    }

    registry.diagnosticDepth++;
    try {
      const diagnostic = this.createRecord(message, level, {
        error: failure,
        error_type: errorTypeOf(original),
        ...(record ? { failed_message: record.message } : {}),
      });
      registry.markDiagnostic(diagnostic);
      let node: Logger | null = this;
      let current = diagnostic;
      while (node) {
        if (node.isEnabledFor(level)) {
          node.emit(current, excluded);
        }
        const next: Logger | null = node.propagate ? node.parentLogger : null;
        if (next) {
          current = next.restamp(diagnostic);
          registry.markDiagnostic(current);
        }
        node = next;
      }
    } finally {
      registry.diagnosticDepth--;
    }
  }
}

function exceptionExtras(error: unknown): LogExtra {
  return {
    exception_type: errorTypeOf(error),
    exception_message: describeError(error) ?? '',
    stack_trace: error instanceof Error ? (error.stack ?? '') : '',
  };
}
