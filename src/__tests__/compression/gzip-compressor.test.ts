import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { gunzipSync } from 'zlib';
import { GzipCompressor } from '../../compression/gzip-compressor';
import { listFiles, makeTempDir, removeDir } from '../helpers';

describe('GzipCompressor', () => {
  let dir: string;
  let source: string;

  beforeEach(() => {
    dir = makeTempDir();
    source = join(dir, 'log_0.log');
    writeFileSync(source, 'first line\nsecond line\n');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should write a gzip file beside the source and remove it', async () => {
    const target = await new GzipCompressor().compress(source);

    expect(target).toBe(`${source}.gz`);
    expect(listFiles(dir)).toEqual(['log_0.log.gz']);
    expect(gunzipSync(readFileSync(target)).toString('utf8')).toBe(
      'first line\nsecond line\n'
    );
  });

  it('should keep the source when asked', async () => {
    await new GzipCompressor({ level: 9, removeSource: false }).compress(source);

    expect(existsSync(source)).toBe(true);
    expect(existsSync(`${source}.gz`)).toBe(true);
  });

  it('should leave an existing archive intact and use the next free name', async () => {
    writeFileSync(`${source}.gz`, 'earlier archive');

    const target = await new GzipCompressor().compress(source);

    expect(target).toBe(join(dir, 'log_0.log.1.gz'));
    expect(readFileSync(`${source}.gz`, 'utf8')).toBe('earlier archive');
    expect(gunzipSync(readFileSync(target)).toString('utf8')).toBe(
      'first line\nsecond line\n'
    );
    expect(listFiles(dir)).toEqual(['log_0.log.1.gz', 'log_0.log.gz']);
  });

  it('should reject for a missing source', async () => {
    await expect(new GzipCompressor().compress(join(dir, 'missing.log'))).rejects.toThrow(
      'ENOENT'
    );
  });
});
