import { ConfigurationError } from '../errors';
import { RotatingFileHandler } from './rotating-file-handler';
import type {
  ActiveFile,
  RotatingFileHandlerOptions,
} from './rotating-file-handler';

export type RotationWhen = 'S' | 'M' | 'H' | 'D' | 'MIDNIGHT';

const UNIT_MS: Record<Exclude<RotationWhen, 'MIDNIGHT'>, number> = {
  S: 1000,
  M: 60_000,
  H: 3_600_000,
  D: 86_400_000,
};

export interface TimedRotatingFileHandlerOptions extends RotatingFileHandlerOptions {
  when?: RotationWhen | Lowercase<RotationWhen>;
  interval?: number;
}

/**
 * Rotating file handler that also moves to the next file once a time
 * boundary passes. Size and line limits still apply.
 */
export class TimedRotatingFileHandler extends RotatingFileHandler {
  public readonly when: RotationWhen;
  public readonly interval: number;
  private deadline: Date;

  constructor(options: TimedRotatingFileHandlerOptions) {
    super({ ...options, backupCount: options.backupCount ?? 5 });
    this.when = parseWhen(options.when ?? 'H');
    this.interval = options.interval ?? 1;
    if (!Number.isInteger(this.interval) || this.interval < 1) {
      throw new ConfigurationError(
        `interval must be an integer >= 1, got ${this.interval}`,
        { interval: this.interval }
      );
    }
    this.deadline = this.nextDeadline(this.clock());
  }

  get nextRotationAt(): Date {
    return this.deadline;
  }

  protected shouldRotate(
    file: ActiveFile,
    incoming: number,
    stem: string,
    now: Date
  ): boolean {
    if (super.shouldRotate(file, incoming, stem, now)) {
      return true;
    }
    if (now.getTime() < this.deadline.getTime()) {
      return false;
    }
    if (file.size === 0) {
      // nothing to retire yet; start a new period on the same file
      this.deadline = this.nextDeadline(now);
      return false;
    }
    return true;
  }

  protected afterRotation(now: Date): void {
    this.deadline = this.nextDeadline(now);
  }

  private nextDeadline(from: Date): Date {
    if (this.when === 'MIDNIGHT') {
      const next = new Date(from.getFullYear(), from.getMonth(), from.getDate());
      next.setDate(next.getDate() + this.interval);
      return next;
    }
    return new Date(from.getTime() + UNIT_MS[this.when] * this.interval);
  }
}

function parseWhen(value: string): RotationWhen {
  const upper = value.toUpperCase();
  switch (upper) {
    case 'S':
    case 'M':
    case 'H':
    case 'D':
    case 'MIDNIGHT':
      return upper;
    default:
      throw new ConfigurationError(
        `Invalid rotation interval unit: ${value}. Expected S, M, H, D or MIDNIGHT`,
        { when: value }
      );
  }
}
