import type { LevelLike } from '../levels';
import type { Logger } from '../logger';
import type { Filter } from './filter';
import type { Formatter } from './formatter';
import type { Handler } from './handler';
import type { Middleware } from './middleware';

/**
 * Logger construction options
 */
export interface LoggerOptions {
  level?: LevelLike;
  prefix?: string;
  enabled?: boolean;
  /** Parent logger; defaults to the registry root, null for none */
  parent?: Logger | null;
  propagate?: boolean;
  handlers?: Handler[];
  filters?: Filter[];
  innerMiddleware?: Middleware[];
  outerMiddleware?: Middleware[];
  formatter?: Formatter;
  context?: Record<string, unknown>;
  tags?: string[];
}

export interface ExceptionOptions {
  level?: LevelLike;
  extra?: Record<string, unknown>;
}

export interface ScopeOptions {
  level?: LevelLike;
  startMessage?: string;
  endMessage?: string;
}

/**
 * Timer interface for performance measurement
 */
export interface Timer {
  end(): void;
  elapsed(): number;
}
