import { z } from 'zod';
import { GzipCompressor } from '../compression/gzip-compressor';
import { ConfigurationError } from '../errors';
import { CompositeFilter, LevelFilter, ModuleFilter, RegexFilter, TimeFilter } from '../filters/filters';
import {
  CsvFormatter,
  HtmlFormatter,
  JsonFormatter,
  MarkdownFormatter,
  XmlFormatter,
  YamlFormatter,
} from '../formatters/structured-formatters';
import { TemplateFormatter } from '../formatters/template-formatter';
import { RotatingFileHandler } from '../handlers/rotating-file-handler';
import { StreamHandler } from '../handlers/stream-handler';
import { TimedRotatingFileHandler } from '../handlers/timed-rotating-file-handler';
import { LogLevel } from '../levels';
import type { Logger } from '../logger';
import type { LoggerRegistry } from '../registry';
import type { Filter } from '../types/filter';
import type { Formatter } from '../types/formatter';
import type { Compressor, Handler } from '../types/handler';

const LevelNameSchema = z
  .string()
  .refine(name => LogLevel.get(name) !== undefined, name => ({
    message: `Invalid log level: ${name}. Valid levels: ${LogLevel.names().join(', ')}`,
  }));

export type FilterConfig =
  | { type: 'level'; level: string }
  | { type: 'regex'; pattern: string; invert?: boolean }
  | { type: 'time'; start_time: string; end_time: string }
  | { type: 'module'; module_name: string }
  | { type: 'composite'; mode?: string; filters: FilterConfig[] };

/**
 * Filter configuration schema (recursive through `composite`)
 */
export const FilterConfigSchema: z.ZodType<FilterConfig> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('level'), level: LevelNameSchema }),
    z.object({
      type: z.literal('regex'),
      pattern: z.string(),
      invert: z.boolean().optional(),
    }),
    z.object({
      type: z.literal('time'),
      start_time: z.string(),
      end_time: z.string(),
    }),
    z.object({ type: z.literal('module'), module_name: z.string().min(1) }),
    z.object({
      type: z.literal('composite'),
      mode: z.string().optional(),
      filters: z.array(FilterConfigSchema),
    }),
  ])
);

/**
 * Formatter configuration schema
 */
export const FormatterConfigSchema = z.object({
  type: z
    .enum(['default', 'json', 'xml', 'yaml', 'csv', 'html', 'markdown'])
    .default('default'),
  template: z.string().optional(),
  time_format: z.string().optional(),
});

const handlerFields = {
  name: z.string().optional(),
  filters: z.array(FilterConfigSchema).optional(),
  formatter: FormatterConfigSchema.optional(),
};

const fileHandlerFields = {
  ...handlerFields,
  file_directory: z.string().default('logs'),
  file_name: z.string().optional(),
  extension: z.string().optional(),
  max_size: z.number().int().positive().optional(),
  max_lines: z.number().int().positive().optional(),
  backup_count: z.number().int().min(0).optional(),
  compress: z.boolean().default(false),
};

/**
 * Handler configuration schema
 */
export const HandlerConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('stream'),
    colors: z.boolean().default(true),
    ...handlerFields,
  }),
  z.object({ type: z.literal('file'), ...fileHandlerFields }),
  z.object({ type: z.literal('size_rotating_file'), ...fileHandlerFields }),
  z.object({
    type: z.literal('timed_rotating_file'),
    ...fileHandlerFields,
    when: z.enum(['S', 'M', 'H', 'D', 'MIDNIGHT']).default('H'),
    interval: z.number().int().positive().default(1),
  }),
]);

/**
 * Logger configuration schema
 */
export const LoggerConfigSchema = z.object({
  name: z.string().optional(),
  level: LevelNameSchema.optional(),
  prefix: z.string().optional(),
  enabled: z.boolean().optional(),
  propagate: z.boolean().optional(),
  formatter: FormatterConfigSchema.optional(),
  handlers: z.array(HandlerConfigSchema).optional(),
  filters: z.array(FilterConfigSchema).optional(),
});

export type FormatterConfig = z.infer<typeof FormatterConfigSchema>;
export type HandlerConfig = z.infer<typeof HandlerConfigSchema>;
export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

export interface ConfigureOptions {
  /** Used for handlers with `compress: true`. Defaults to gzip */
  compressor?: Compressor;
}

/**
 * Validate a logger configuration map
 */
export function validateLoggerConfig(config: unknown): {
  valid: boolean;
  data?: LoggerConfig;
  errors?: z.ZodError['errors'];
} {
  const result = LoggerConfigSchema.safeParse(resolveEnvironmentVariables(config));

  if (result.success) {
    return {
      valid: true,
      data: result.data,
    };
  }

  return {
    valid: false,
    errors: result.error.errors,
  };
}

function parseLoggerConfig(config: unknown): LoggerConfig {
  const validation = validateLoggerConfig(config);
  if (!validation.valid || !validation.data) {
    const issues = validation.errors ?? [];
    const summary = issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid logger configuration: ${summary}`, {
      issues,
    });
  }
  return validation.data;
}

/**
 * Apply a configuration map to an existing logger. Handlers and filters are
 * added to the ones the logger already has.
 */
export function applyConfiguration(
  logger: Logger,
  config: unknown,
  options: ConfigureOptions = {}
): Logger {
  const data = parseLoggerConfig(config);
  // Build everything first so a bad entry leaves the logger untouched
  const formatter = data.formatter ? buildFormatter(data.formatter) : undefined;
  const handlers = (data.handlers ?? []).map(handler => buildHandler(handler, options));
  const filters = (data.filters ?? []).map(buildFilter);

  if (data.level !== undefined) {
    logger.setLevel(data.level);
  }
  if (data.prefix !== undefined) {
    logger.prefix = data.prefix;
  }
  if (data.enabled !== undefined) {
    logger.enabled = data.enabled;
  }
  if (data.propagate !== undefined) {
    logger.propagate = data.propagate;
  }
  if (formatter) {
    logger.formatter = formatter;
  }
  handlers.forEach(handler => logger.addHandler(handler));
  filters.forEach(filter => logger.addFilter(filter));
  return logger;
}

/**
 * Get or create the logger named by `name` (the root logger when absent)
 * and apply the configuration map to it.
 */
export function configureLogger(
  registry: LoggerRegistry,
  config: unknown,
  options: ConfigureOptions = {}
): Logger {
  const data = parseLoggerConfig(config);
  return applyConfiguration(registry.getLogger(data.name), data, options);
}

export function buildFilter(config: FilterConfig): Filter {
  switch (config.type) {
    case 'level':
      return new LevelFilter(config.level);
    case 'regex':
      return new RegexFilter(config.pattern, { invert: config.invert });
    case 'time':
      return new TimeFilter(config.start_time, config.end_time);
    case 'module':
      return new ModuleFilter(config.module_name);
    case 'composite':
      return new CompositeFilter(config.filters.map(buildFilter), config.mode);
  }
}

export function buildFormatter(config: FormatterConfig): Formatter {
  switch (config.type) {
    case 'json':
      return new JsonFormatter();
    case 'xml':
      return new XmlFormatter();
    case 'yaml':
      return new YamlFormatter();
    case 'csv':
      return new CsvFormatter();
    case 'html':
      return new HtmlFormatter();
    case 'markdown':
      return new MarkdownFormatter();
    case 'default':
      return new TemplateFormatter(config.template, {
        timeFormat: config.time_format,
      });
  }
}

export function buildHandler(
  config: HandlerConfig,
  options: ConfigureOptions = {}
): Handler {
  const common = {
    name: config.name,
    filters: (config.filters ?? []).map(buildFilter),
    formatter: config.formatter ? buildFormatter(config.formatter) : undefined,
  };

  if (config.type === 'stream') {
    return new StreamHandler({ ...common, colors: config.colors });
  }

  const file = {
    ...common,
    directory: config.file_directory,
    fileName: config.file_name,
    extension: config.extension,
    maxSize: config.max_size,
    maxLines: config.max_lines,
    backupCount: config.backup_count,
    compressor: config.compress
      ? (options.compressor ?? new GzipCompressor())
      : undefined,
  };

  if (config.type === 'timed_rotating_file') {
    return new TimedRotatingFileHandler({
      ...file,
      when: config.when,
      interval: config.interval,
    });
  }
  return new RotatingFileHandler(file);
}

/**
 * Resolve ${VAR} references in string values from process.env
 */
export function resolveEnvironmentVariables(config: unknown): unknown {
  if (typeof config === 'string') {
    const envVarPattern = /\$\{([^}]+)\}/g;
    return config.replace(envVarPattern, (match, varName: string) => {
      return process.env[varName] ?? match;
    });
  }

  if (Array.isArray(config)) {
    return config.map(resolveEnvironmentVariables);
  }

  if (config && typeof config === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      resolved[key] = resolveEnvironmentVariables(value);
    }
    return resolved;
  }

  return config;
}
