export { LogLevel } from './levels';
export type { LevelLike } from './levels';
export {
  LoggingError,
  ConfigurationError,
  FilterEvaluationError,
  HandlerIOError,
  RotationExhaustedError,
  MiddlewareError,
  FormatterError,
} from './errors';

export {
  Logger,
  ROOT_LOGGER_NAME,
  ROOT_LOGGER_PREFIX,
  normalizeLoggerName,
} from './logger';
export type { LogExtra } from './logger';
export { LoggerRegistry } from './registry';
export type { LoggerRegistryOptions } from './registry';

export {
  LevelFilter,
  RegexFilter,
  TimeFilter,
  ModuleFilter,
  CompositeFilter,
  PredicateFilter,
} from './filters/filters';
export type { CompositeMode, RegexFilterOptions } from './filters/filters';

export { BaseFormatter, recordFields, RECORD_FIELD_NAMES } from './formatters/base-formatter';
export type { RecordFields } from './formatters/base-formatter';
export {
  TemplateFormatter,
  DEFAULT_TEMPLATE,
  DEFAULT_TIME_FORMAT,
} from './formatters/template-formatter';
export type { TemplateFormatterOptions } from './formatters/template-formatter';
export {
  JsonFormatter,
  XmlFormatter,
  YamlFormatter,
  CsvFormatter,
  HtmlFormatter,
  MarkdownFormatter,
} from './formatters/structured-formatters';

export { BaseHandler } from './handlers/base-handler';
export { StreamHandler } from './handlers/stream-handler';
export type { StreamHandlerOptions, TextSink } from './handlers/stream-handler';
export { MemoryHandler } from './handlers/memory-handler';
export type { MemoryEntry, MemoryHandlerOptions } from './handlers/memory-handler';
export {
  RotatingFileHandler,
  DEFAULT_MAX_SIZE,
  DEFAULT_FILE_NAME,
} from './handlers/rotating-file-handler';
export type {
  RotatingFileHandlerOptions,
  RotationState,
} from './handlers/rotating-file-handler';
export { TimedRotatingFileHandler } from './handlers/timed-rotating-file-handler';
export type {
  RotationWhen,
  TimedRotatingFileHandlerOptions,
} from './handlers/timed-rotating-file-handler';
export { TransportHandler, levelToWinston } from './handlers/transport-handler';
export type { TransportHandlerOptions } from './handlers/transport-handler';
export { RemoteHandler } from './handlers/remote-handler';
export type { RemoteHandlerOptions } from './handlers/remote-handler';

export { MiddlewareChain } from './middleware/MiddlewareChain';
export { BaseMiddleware, defineMiddleware } from './middleware/base-middleware';
export type { MiddlewareFunction, MiddlewareOptions } from './middleware/base-middleware';
export { ContextMiddleware } from './middleware/context-middleware';
export type { ContextMiddlewareOptions } from './middleware/context-middleware';
export { RedactMiddleware, DEFAULT_REDACT_KEYS } from './middleware/redact-middleware';
export type { RedactMiddlewareOptions } from './middleware/redact-middleware';
export { AlertMiddleware } from './middleware/alert-middleware';
export type { AlertMiddlewareOptions } from './middleware/alert-middleware';

export { GzipCompressor } from './compression/gzip-compressor';
export type { GzipCompressorOptions } from './compression/gzip-compressor';
export { LoggerTransport, levelFromWinston } from './bridge/winston-bridge';
export type { LoggerTransportOptions } from './bridge/winston-bridge';

export {
  LoggerConfigSchema,
  HandlerConfigSchema,
  FilterConfigSchema,
  FormatterConfigSchema,
  validateLoggerConfig,
  applyConfiguration,
  configureLogger,
  buildFilter,
  buildHandler,
  buildFormatter,
  resolveEnvironmentVariables,
} from './config/schema';
export type {
  FilterConfig,
  FormatterConfig,
  HandlerConfig,
  LoggerConfig,
  LoggerConfigInput,
  ConfigureOptions,
} from './config/schema';

export type { LogRecord, LogOutput } from './types/record';
export type { Filter } from './types/filter';
export type { Formatter } from './types/formatter';
export type {
  Handler,
  HandlerOptions,
  HandleStatus,
  RemoteSender,
  Compressor,
} from './types/handler';
export type { Middleware, MiddlewareStage } from './types/middleware';
export type {
  LoggerOptions,
  ExceptionOptions,
  ScopeOptions,
  Timer,
} from './types/logger';
