import {
  close,
  closeSync,
  existsSync,
  mkdirSync,
  open,
  openSync,
  readFileSync,
  readdirSync,
  statSync,
  unlinkSync,
  write,
  writeSync,
} from 'fs';
import {
  access,
  readFile as readFileAsync,
  readdir as readdirAsync,
  stat as statAsync,
  unlink as unlinkAsync,
} from 'fs/promises';
import { basename, join } from 'path';
import { promisify } from 'util';
import {
  ConfigurationError,
  HandlerIOError,
  RotationExhaustedError,
  describeError,
} from '../errors';
import type { Logger } from '../logger';
import type { Compressor, HandlerOptions } from '../types/handler';
import type { LogRecord } from '../types/record';
import { AsyncLock } from '../utils/async-lock';
import { formatTimestamp } from '../utils/time';
import { BaseHandler } from './base-handler';

const openAsync = promisify(open);
const writeAsync = promisify(write);
const closeAsync = promisify(close);

export const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;
export const DEFAULT_FILE_NAME = 'log_{index}';

export type RotationState = 'no-file' | 'open' | 'rotating' | 'closed';

export interface RotatingFileHandlerOptions extends HandlerOptions {
  directory: string;
  /** Must contain {index}; may contain {date} (YYYY-MM-DD) and {time} (HH-mm-ss) */
  fileName?: string;
  extension?: string;
  /** Bytes per file, > 0 */
  maxSize?: number;
  maxLines?: number;
  startIndex?: number;
  /** Candidate files examined per search before giving up */
  maxProbes?: number;
  /** Extra attempts after a failed write */
  writeRetries?: number;
  /** Rotated files kept as they are; older ones are compressed or deleted */
  backupCount?: number;
  compressor?: Compressor;
  /** Clock used for {date}, {time} and timed rotation */
  now?: () => Date;
}

export interface ActiveFile {
  readonly path: string;
  readonly index: number;
  /** File name template with {date} and {time} filled in */
  readonly stem: string;
  fd: number;
  size: number;
  lines: number;
}

/**
 * Appends formatted records to `<directory>/<fileName><extension>`, moving to
 * the next free index whenever the byte or line limit would be exceeded.
 *
 * Awaited writes serialise through a per-handler lock that covers the limit
 * check, the rotation and the write. A blocking write that arrives while the
 * lock is held is queued behind it.
 */
export class RotatingFileHandler extends BaseHandler {
  public readonly directory: string;
  public readonly fileName: string;
  public readonly extension: string;
  public readonly maxSize: number;
  public readonly maxLines?: number;
  public readonly startIndex: number;
  public readonly maxProbes: number;
  public readonly writeRetries: number;
  public readonly backupCount?: number;

  protected readonly clock: () => Date;
  private readonly compressor?: Compressor;
  private readonly lock = new AsyncLock();
  private readonly pattern: RegExp;
  private readonly retiring = new Set<string>();
  private current?: ActiveFile;
  private phase: RotationState = 'no-file';
  private rotations = 0;

  constructor(options: RotatingFileHandlerOptions) {
    super(options);
    this.fileName = options.fileName ?? DEFAULT_FILE_NAME;
    this.extension = normaliseExtension(options.extension ?? '.log');
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.maxLines = options.maxLines;
    this.startIndex = options.startIndex ?? 0;
    this.maxProbes = options.maxProbes ?? 1000;
    this.writeRetries = options.writeRetries ?? 2;
    this.backupCount = options.backupCount;
    this.compressor = options.compressor;
    this.clock = options.now ?? (() => new Date());

    if (!this.fileName.includes('{index}')) {
      throw new ConfigurationError(
        `File name template must contain {index}: ${this.fileName}`,
        { fileName: this.fileName }
      );
    }
    checkLimit('maxSize', this.maxSize, 1);
    if (this.maxLines !== undefined) {
      checkLimit('maxLines', this.maxLines, 1);
    }
    checkLimit('startIndex', this.startIndex, 0);
    checkLimit('maxProbes', this.maxProbes, 1);
    checkLimit('writeRetries', this.writeRetries, 0);
    if (this.backupCount !== undefined) {
      checkLimit('backupCount', this.backupCount, 0);
    }

    this.pattern = templatePattern(this.fileName, this.extension);
    this.directory = options.directory;
    mkdirSync(this.directory, { recursive: true });
  }

  get currentFile(): string | undefined {
    return this.current?.path;
  }

  get rotationCount(): number {
    return this.rotations;
  }

  get state(): RotationState {
    return this.phase;
  }

  close(): void | Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.lock.isLocked) {
      return this.lock.runExclusive(() => this.release());
    }
    this.release();
  }

  protected emit(
    _record: LogRecord,
    text: string,
    logger: Logger
  ): void | Promise<void> {
    const line = `${text}\n`;
    if (this.lock.isLocked) {
      return this.lock.runExclusive(() => this.writeLine(line, logger));
    }
    this.writeLine(line, logger);
  }

  protected async emitAsync(
    _record: LogRecord,
    text: string,
    logger: Logger
  ): Promise<void> {
    const line = `${text}\n`;
    await this.lock.runExclusive(() => this.writeLineAsync(line, logger));
  }

  /**
   * Whether `incoming` bytes must go to a new file.
   */
  protected shouldRotate(
    file: ActiveFile,
    incoming: number,
    stem: string,
    _now: Date
  ): boolean {
    if (stem !== file.stem) {
      return true;
    }
    if (file.size > 0 && file.size + incoming > this.maxSize) {
      return true;
    }
    return this.maxLines !== undefined && file.lines >= this.maxLines;
  }

  /** Called once a rotation has switched files. */
  protected afterRotation(_now: Date): void {}

  protected renderStem(now: Date): string {
    return this.fileName
      .replace(/\{date\}/g, formatTimestamp(now, 'YYYY-MM-DD'))
      .replace(/\{time\}/g, formatTimestamp(now, 'HH-mm-ss'));
  }

  protected pathFor(stem: string, index: number): string {
    return join(
      this.directory,
      `${stem.replace(/\{index\}/g, String(index))}${this.extension}`
    );
  }

  private writeLine(line: string, logger: Logger): void {
    this.assertWritable();
    const data = Buffer.from(line, 'utf8');
    const now = this.clock();
    const stem = this.renderStem(now);

    let file = this.current;
    if (!file) {
      file = this.openCandidate(this.startIndex, stem, data.length);
    } else if (this.shouldRotate(file, data.length, stem, now)) {
      file = this.rotate(file, stem, data.length, now, logger);
    }

    let offset = 0;
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.writeRetries; attempt++) {
      try {
        while (offset < data.length) {
          offset += writeSync(file.fd, data, offset, data.length - offset);
        }
        break;
      } catch (error) {
        lastError = error;
      }
    }
    if (offset < data.length) {
      throw writeFailure(file, this.writeRetries, lastError);
    }
    file.size += data.length;
    file.lines += countLines(line);
  }

  private async writeLineAsync(line: string, logger: Logger): Promise<void> {
    this.assertWritable();
    const data = Buffer.from(line, 'utf8');
    const now = this.clock();
    const stem = this.renderStem(now);

    let file = this.current;
    if (!file) {
      file = await this.openCandidateAsync(this.startIndex, stem, data.length);
    } else if (this.shouldRotate(file, data.length, stem, now)) {
      file = await this.rotateAsync(file, stem, data.length, now, logger);
    }

    let offset = 0;
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.writeRetries; attempt++) {
      try {
        while (offset < data.length) {
          const { bytesWritten } = await writeAsync(
            file.fd,
            data,
            offset,
            data.length - offset
          );
          offset += bytesWritten;
        }
        break;
      } catch (error) {
        lastError = error;
      }
    }
    if (offset < data.length) {
      throw writeFailure(file, this.writeRetries, lastError);
    }
    file.size += data.length;
    file.lines += countLines(line);
  }

  private rotate(
    file: ActiveFile,
    stem: string,
    incoming: number,
    now: Date,
    logger: Logger
  ): ActiveFile {
    this.phase = 'rotating';
    this.current = undefined;
    closeSync(file.fd);
    this.phase = 'no-file';
    const next = this.openCandidate(this.nextStart(file, stem), stem, incoming);
    this.rotations++;
    this.afterRotation(now);
    try {
      this.retire(logger);
    } catch (error) {
      this.reportRetireFailure(logger, this.directory, error);
    }
    return next;
  }

  private async rotateAsync(
    file: ActiveFile,
    stem: string,
    incoming: number,
    now: Date,
    logger: Logger
  ): Promise<ActiveFile> {
    this.phase = 'rotating';
    this.current = undefined;
    await closeAsync(file.fd);
    this.phase = 'no-file';
    const next = await this.openCandidateAsync(
      this.nextStart(file, stem),
      stem,
      incoming
    );
    this.rotations++;
    this.afterRotation(now);
    try {
      await this.retireAsync(logger);
    } catch (error) {
      this.reportRetireFailure(logger, this.directory, error);
    }
    return next;
  }

  private nextStart(file: ActiveFile, stem: string): number {
    return stem === file.stem ? file.index + 1 : this.startIndex;
  }

  private openCandidate(from: number, stem: string, incoming: number): ActiveFile {
    for (let index = from; index < from + this.maxProbes; index++) {
      const path = this.pathFor(stem, index);
      const archive = this.archivePath(path);
      if (archive !== undefined && existsSync(archive)) {
        continue;
      }
      const stats = statSync(path, { throwIfNoEntry: false });
      const size = stats?.size ?? 0;
      const lines =
        this.maxLines !== undefined && size > 0
          ? countLines(readFileSync(path, 'utf8'))
          : 0;
      if (this.accepts(size, lines, incoming)) {
        return this.activate({ path, index, stem, fd: openSync(path, 'a'), size, lines });
      }
    }
    throw this.exhausted(from, stem);
  }

  private async openCandidateAsync(
    from: number,
    stem: string,
    incoming: number
  ): Promise<ActiveFile> {
    for (let index = from; index < from + this.maxProbes; index++) {
      const path = this.pathFor(stem, index);
      const archive = this.archivePath(path);
      if (archive !== undefined && (await pathExists(archive))) {
        continue;
      }
      const size = await sizeOf(path);
      const lines =
        this.maxLines !== undefined && size > 0
          ? countLines(await readFileAsync(path, 'utf8'))
          : 0;
      if (this.accepts(size, lines, incoming)) {
        const fd = await openAsync(path, 'a');
        return this.activate({ path, index, stem, fd, size, lines });
      }
    }
    throw this.exhausted(from, stem);
  }

  /** Where the compressor archives `path`; an existing archive occupies the index */
  private archivePath(path: string): string | undefined {
    const extension = this.compressor?.extension;
    return extension === undefined ? undefined : `${path}${extension}`;
  }

  private accepts(size: number, lines: number, incoming: number): boolean {
    if (size === 0) {
      return true;
    }
    if (size + incoming > this.maxSize) {
      return false;
    }
    return this.maxLines === undefined || lines < this.maxLines;
  }

  private activate(file: ActiveFile): ActiveFile {
    this.current = file;
    this.phase = 'open';
    return file;
  }

  private exhausted(from: number, stem: string): RotationExhaustedError {
    return new RotationExhaustedError(
      `No usable log file after ${this.maxProbes} candidates starting at ${this.pathFor(stem, from)}`,
      { directory: this.directory, from, maxProbes: this.maxProbes }
    );
  }

  private assertWritable(): void {
    if (this.phase === 'closed') {
      throw new HandlerIOError(`Handler "${this.name}" is closed`, {
        handler: this.name,
      });
    }
  }

  private release(): void {
    const file = this.current;
    this.current = undefined;
    this.phase = 'closed';
    if (file) {
      closeSync(file.fd);
    }
  }

  /**
   * Rotated files beyond `backupCount`, newest kept first. Files already being
   * compressed are skipped.
   */
  private selectRetired(entries: Array<{ path: string; mtime: number }>): string[] {
    const keep = this.backupCount ?? 0;
    return entries
      .filter(entry => !this.retiring.has(entry.path))
      .sort(
        (a, b) => b.mtime - a.mtime || this.indexOf(b.path) - this.indexOf(a.path)
      )
      .slice(keep)
      .map(entry => entry.path);
  }

  private retire(logger: Logger): void {
    if (this.backupCount === undefined && !this.compressor) {
      return;
    }
    const entries = readdirSync(this.directory)
      .filter(name => this.pattern.test(name))
      .map(name => join(this.directory, name))
      .filter(path => path !== this.current?.path)
      .map(path => ({ path, mtime: statSync(path).mtimeMs }));

    for (const path of this.selectRetired(entries)) {
      try {
        if (!this.compressor) {
          unlinkSync(path);
          continue;
        }
        const result = this.compressor.compress(path);
        if (result instanceof Promise) {
          this.retiring.add(path);
          void result.then(
            () => this.retiring.delete(path),
            (error: unknown) => {
              this.retiring.delete(path);
              this.reportRetireFailure(logger, path, error);
            }
          );
        }
      } catch (error) {
        this.reportRetireFailure(logger, path, error);
      }
    }
  }

  private async retireAsync(logger: Logger): Promise<void> {
    if (this.backupCount === undefined && !this.compressor) {
      return;
    }
    const names = await readdirAsync(this.directory);
    const entries: Array<{ path: string; mtime: number }> = [];
    for (const name of names) {
      const path = join(this.directory, name);
      if (this.pattern.test(name) && path !== this.current?.path) {
        entries.push({ path, mtime: (await statAsync(path)).mtimeMs });
      }
    }

    for (const path of this.selectRetired(entries)) {
      try {
        if (this.compressor) {
          this.retiring.add(path);
          await this.compressor.compress(path);
        } else {
          await unlinkAsync(path);
        }
      } catch (error) {
        this.reportRetireFailure(logger, path, error);
      } finally {
        this.retiring.delete(path);
      }
    }
  }

  // The rotation itself stands; only the clean-up is reported
  private reportRetireFailure(logger: Logger, path: string, error: unknown): void {
    const verb = this.compressor ? 'compress' : 'remove';
    logger.reportHandlerFailure(
      this,
      new HandlerIOError(
        `Failed to ${verb} rotated file ${path}: ${describeError(error)}`,
        { path },
        { cause: error }
      )
    );
  }

  private indexOf(path: string): number {
    const match = this.pattern.exec(basename(path));
    return match ? Number(match[1]) : -1;
  }
}

function normaliseExtension(extension: string): string {
  if (!extension || extension.startsWith('.')) {
    return extension;
  }
  return `.${extension}`;
}

function checkLimit(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `${name} must be an integer >= ${min}, got ${value}`,
      { [name]: value }
    );
  }
}

function countLines(text: string): number {
  let count = 0;
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    count++;
  }
  return count;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function sizeOf(path: string): Promise<number> {
  try {
    return (await statAsync(path)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }
}

function writeFailure(
  file: ActiveFile,
  retries: number,
  cause: unknown
): HandlerIOError {
  return new HandlerIOError(
    `Failed to write ${file.path} after ${retries + 1} attempts: ${describeError(cause)}`,
    { path: file.path, attempts: retries + 1 },
    { cause }
  );
}

/**
 * Matches file names produced from the template. Group 1 is the index.
 */
export function templatePattern(fileName: string, extension: string): RegExp {
  const escape = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  let indexSeen = false;
  const body = fileName
    .split(/(\{index\}|\{date\}|\{time\})/)
    .map(part => {
      switch (part) {
        case '{index}':
          if (indexSeen) {
            return '\\d+';
          }
          indexSeen = true;
          return '(\\d+)';
        case '{date}':
          return '\\d{4}-\\d{2}-\\d{2}';
        case '{time}':
          return '\\d{2}-\\d{2}-\\d{2}';
        default:
          return escape(part);
      }
    })
    .join('');
  return new RegExp(`^${body}${escape(extension)}$`);
}
