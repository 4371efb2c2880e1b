import { ConfigurationError } from '../errors';
import type { Logger } from '../logger';
import type { Middleware, MiddlewareStage } from '../types/middleware';
import type { LogRecord } from '../types/record';

/**
 * Ordered middleware steps for one stage of a logger.
 *
 * Steps are kept sorted by ascending priority at insertion time; equal
 * priorities keep insertion order. A throwing step is reported and skipped,
 * and the chain carries on with the record it was given.
 */
export class MiddlewareChain {
  private steps: Middleware[] = [];

  constructor(
    public readonly stage: MiddlewareStage,
    initial: Middleware[] = []
  ) {
    for (const middleware of initial) {
      this.add(middleware);
    }
  }

  get size(): number {
    return this.steps.length;
  }

  add(middleware: Middleware): void {
    if (this.steps.some(step => step.name === middleware.name)) {
      throw new ConfigurationError(
        `Middleware ${middleware.name} is already registered in the ${this.stage} chain`,
        { name: middleware.name, stage: this.stage }
      );
    }
    const next = [...this.steps];
    let at = next.length;
    while (at > 0 && next[at - 1].priority > middleware.priority) {
      at--;
    }
    next.splice(at, 0, middleware);
    this.steps = next;
  }

  remove(name: string): boolean {
    const next = this.steps.filter(step => step.name !== name);
    const removed = next.length !== this.steps.length;
    this.steps = next;
    return removed;
  }

  get(name: string): Middleware | undefined {
    return this.steps.find(step => step.name === name);
  }

  list(): readonly Middleware[] {
    return this.steps;
  }

  enable(name: string): void {
    const step = this.get(name);
    if (step) {
      step.enabled = true;
    }
  }

  disable(name: string): void {
    const step = this.get(name);
    if (step) {
      step.enabled = false;
    }
  }

  /**
   * Returns the processed record, or null when a step rejected it.
   */
  run(record: LogRecord, logger: Logger): LogRecord | null {
    let current = record;
    for (const step of this.steps) {
      if (step.enabled === false) {
        continue;
      }
      try {
        const next = step.process(current, logger);
        if (next === null) {
          return null;
        }
        current = next;
      } catch (error) {
        logger.reportMiddlewareFailure(step, error, current);
      }
    }
    return current;
  }

  async runAsync(record: LogRecord, logger: Logger): Promise<LogRecord | null> {
    let current = record;
    for (const step of this.steps) {
      if (step.enabled === false) {
        continue;
      }
      try {
        const next = step.processAsync
          ? await step.processAsync(current, logger)
          : step.process(current, logger);
        if (next === null) {
          return null;
        }
        current = next;
      } catch (error) {
        logger.reportMiddlewareFailure(step, error, current);
      }
    }
    return current;
  }
}
