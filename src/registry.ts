import { ConfigurationError, describeError } from './errors';
import { StreamHandler } from './handlers/stream-handler';
import type { TextSink } from './handlers/stream-handler';
import { LogLevel } from './levels';
import type { LevelLike } from './levels';
import {
  Logger,
  ROOT_LOGGER_NAME,
  ROOT_LOGGER_PREFIX,
  normalizeLoggerName,
} from './logger';
import type { Handler } from './types/handler';
import type { LoggerOptions } from './types/logger';
import type { LogRecord } from './types/record';

export interface LoggerRegistryOptions {
  /** Level of the root logger. Default INFO */
  rootLevel?: LevelLike;
  /** Handlers for the root logger. Default: one StreamHandler */
  rootHandlers?: () => Handler[];
  /** Receives failures that cannot be reported through a logger */
  fallback?: TextSink;
}

/**
 * Owns every logger of an application. Construct one at start-up, pass it to
 * whatever needs a logger, and shut it down once on exit.
 */
export class LoggerRegistry {
  /** Nesting of diagnostic dispatches in progress */
  public diagnosticDepth = 0;

  private readonly loggers = new Map<string, Logger>();
  private readonly diagnostics = new WeakSet<LogRecord>();
  private readonly fallback: TextSink;
  private rootLogger?: Logger;
  private shutdownPromise?: Promise<void>;
  private isShutdown = false;
  private exitHookInstalled = false;

  constructor(private readonly options: LoggerRegistryOptions = {}) {
    this.fallback = options.fallback ?? process.stderr;
  }

  /**
   * The root logger, created on first access.
   */
  get root(): Logger {
    if (!this.rootLogger) {
      this.rootLogger = new Logger(ROOT_LOGGER_NAME, this, {
        prefix: ROOT_LOGGER_PREFIX,
        level: this.options.rootLevel ?? LogLevel.INFO,
        parent: null,
        propagate: false,
        handlers: this.options.rootHandlers?.() ?? [new StreamHandler()],
      });
      this.loggers.set(ROOT_LOGGER_NAME, this.rootLogger);
    }
    return this.rootLogger;
  }

  get size(): number {
    return this.loggers.size;
  }

  /**
   * Create a logger. Its parent defaults to the root logger.
   */
  createLogger(name: string, options: LoggerOptions = {}): Logger {
    const key = normalizeLoggerName(name);
    if (key === ROOT_LOGGER_NAME || this.loggers.has(key)) {
      throw new ConfigurationError(`Logger ${key} already exists`, {
        name: key,
      });
    }
    const parent = options.parent === undefined ? this.root : options.parent;
    const logger = new Logger(key, this, { ...options, parent });
    this.loggers.set(key, logger);
    return logger;
  }

  /**
   * Get or create a logger by dotted name, creating missing ancestors on the
   * way. No name returns the root logger.
   */
  getLogger(name?: string): Logger {
    if (name === undefined || name.trim() === '') {
      return this.root;
    }
    const key = normalizeLoggerName(name);
    if (key === ROOT_LOGGER_NAME) {
      return this.root;
    }

    let parent = this.root;
    let path = '';
    for (const segment of key.split('.')) {
      if (!segment) {
        throw new ConfigurationError(`Invalid logger name: ${name}`, { name });
      }
      path = path ? `${path}.${segment}` : segment;
      parent = this.loggers.get(path) ?? this.createLogger(path, { parent });
    }
    return parent;
  }

  has(name: string): boolean {
    return this.loggers.has(normalizeLoggerName(name));
  }

  get(name: string): Logger | undefined {
    return this.loggers.get(normalizeLoggerName(name));
  }

  list(): Logger[] {
    return Array.from(this.loggers.values());
  }

  /**
   * Close every handler of every logger exactly once.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.closeAll();
    return this.shutdownPromise;
  }

  /**
   * Blocking shutdown for exit hooks. Handlers whose close is asynchronous
   * are started but not awaited.
   */
  shutdownSync(): void {
    if (this.isShutdown || this.shutdownPromise) {
      return;
    }
    this.isShutdown = true;
    this.shutdownPromise = Promise.resolve();
    for (const handler of this.uniqueHandlers()) {
      try {
        const result = handler.close();
        if (result instanceof Promise) {
          void result.then(undefined, (error: unknown) =>
            this.closeFailed(handler, error)
          );
        }
      } catch (error) {
        this.closeFailed(handler, error);
      }
    }
  }

  installExitHook(): void {
    if (this.exitHookInstalled) {
      return;
    }
    this.exitHookInstalled = true;
    process.once('exit', () => this.shutdownSync());
  }

  writeFallback(message: string): void {
    this.fallback.write(`[treelog] ${message}\n`);
  }

  markDiagnostic(record: LogRecord): void {
    this.diagnostics.add(record);
  }

  isDiagnostic(record: LogRecord): boolean {
    return this.diagnostics.has(record);
  }

  private async closeAll(): Promise<void> {
    this.isShutdown = true;
    await Promise.all(
      this.uniqueHandlers().map(async handler => {
        try {
          await handler.close();
        } catch (error) {
          this.closeFailed(handler, error);
        }
      })
    );
  }

  private uniqueHandlers(): Handler[] {
    const handlers = new Set<Handler>();
    for (const logger of this.loggers.values()) {
      for (const handler of logger.handlers) {
        handlers.add(handler);
      }
    }
    return Array.from(handlers);
  }

  private closeFailed(handler: Handler, error: unknown): void {
    this.writeFallback(
      `Failed to close handler "${handler.name}": ${describeError(error)}`
    );
  }
}
