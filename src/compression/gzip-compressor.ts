import { createReadStream, createWriteStream } from 'fs';
import { unlink } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import type { Compressor } from '../types/handler';

export interface GzipCompressorOptions {
  /** zlib level, 0-9. Defaults to zlib's default */
  level?: number;
  /** Remove the source once compressed. Default true */
  removeSource?: boolean;
}

/**
 * Streams a retired log file into `<source>.gz`. An existing archive is never
 * overwritten; the next free `<source>.<n>.gz` is used instead.
 */
export class GzipCompressor implements Compressor {
  readonly extension = '.gz';

  constructor(private readonly options: GzipCompressorOptions = {}) {}

  async compress(sourcePath: string): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      const target =
        attempt === 0 ? `${sourcePath}.gz` : `${sourcePath}.${attempt}.gz`;
      try {
        await pipeline(
          createReadStream(sourcePath),
          createGzip(
            this.options.level === undefined ? {} : { level: this.options.level }
          ),
          createWriteStream(target, { flags: 'wx' })
        );
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          continue;
        }
        throw error;
      }
      if (this.options.removeSource !== false) {
        await unlink(sourcePath);
      }
      return target;
    }
  }
}
