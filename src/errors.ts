/**
 * Base class for every error raised by the logging pipeline.
 */
export class LoggingError extends Error {
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
    this.timestamp = new Date();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: describeError(this.cause),
    };
  }
}

/**
 * Invalid construction: duplicate names, missing placeholders, unknown types.
 * Always thrown synchronously from the constructing call.
 */
export class ConfigurationError extends LoggingError {}

/**
 * A filter threw while evaluating a record. The filter counts as rejecting.
 */
export class FilterEvaluationError extends LoggingError {}

/**
 * A handler could not deliver a record (file write, transport or remote send).
 */
export class HandlerIOError extends LoggingError {}

/**
 * The rotating file handler ran out of candidate files to probe.
 */
export class RotationExhaustedError extends HandlerIOError {}

/**
 * A middleware step threw. The chain continues with the last good record.
 */
export class MiddlewareError extends LoggingError {}

/**
 * The logger's own formatter threw while rendering a call's return value.
 */
export class FormatterError extends LoggingError {}

/**
 * Short, single-line description of an unknown thrown value.
 */
export function describeError(error: unknown): string | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function errorTypeOf(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return typeof error;
}
