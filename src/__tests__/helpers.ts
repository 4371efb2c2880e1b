import { mkdtempSync, readdirSync, readFileSync, rmSync, statSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LogLevel } from '../levels';
import { LoggerRegistry } from '../registry';
import type { LogRecord } from '../types/record';

export function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    message: 'hello',
    level: LogLevel.INFO,
    loggerName: 'app',
    prefix: 'APP',
    createdAt: new Date(2024, 0, 15, 10, 30, 45, 123),
    extra: {},
    tags: [],
    ...overrides,
  };
}

export interface TestRegistry {
  registry: LoggerRegistry;
  fallback: string[];
}

/**
 * Registry whose root has no handlers and whose fallback lines are captured.
 */
export function createTestRegistry(): TestRegistry {
  const fallback: string[] = [];
  const registry = new LoggerRegistry({
    rootHandlers: () => [],
    fallback: {
      write: (text: string) => {
        fallback.push(text);
        return true;
      },
    },
  });
  return { registry, fallback };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'treelog-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function listFiles(dir: string): string[] {
  return readdirSync(dir).sort();
}

export function fileSize(path: string): number {
  return statSync(path).size;
}

export function readText(path: string): string {
  return readFileSync(path, 'utf8');
}
