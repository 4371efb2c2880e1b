import { describe, it, expect } from 'vitest';
import {
  CompositeFilter,
  LevelFilter,
  ModuleFilter,
  PredicateFilter,
  RegexFilter,
  TimeFilter,
} from '../../filters/filters';
import { ConfigurationError } from '../../errors';
import { LogLevel } from '../../levels';
import type { Filter } from '../../types/filter';
import { makeRecord } from '../helpers';

const at = (hour: number, minute: number, second = 0) =>
  makeRecord({ createdAt: new Date(2024, 0, 15, hour, minute, second) });

const constant = (value: boolean): Filter => ({ admit: () => value });

describe('Filters', () => {
  describe('LevelFilter', () => {
    it('should admit records at or above the threshold', () => {
      const filter = new LevelFilter(LogLevel.WARNING);

      expect(filter.admit(makeRecord({ level: LogLevel.WARNING }))).toBe(true);
      expect(filter.admit(makeRecord({ level: LogLevel.ERROR }))).toBe(true);
      expect(filter.admit(makeRecord({ level: LogLevel.INFO }))).toBe(false);
    });

    it('should accept level names and numbers', () => {
      expect(new LevelFilter('error').threshold).toBe(LogLevel.ERROR);
      expect(new LevelFilter(20).threshold).toBe(LogLevel.DEBUG);
    });
  });

  describe('RegexFilter', () => {
    it('should search anywhere in the message', () => {
      const filter = new RegexFilter('disk \\d+');

      expect(filter.admit(makeRecord({ message: 'warning: disk 3 full' }))).toBe(true);
      expect(filter.admit(makeRecord({ message: 'disk full' }))).toBe(false);
    });

    it('should negate the match when inverted', () => {
      const filter = new RegexFilter('heartbeat', { invert: true });

      expect(filter.admit(makeRecord({ message: 'heartbeat ok' }))).toBe(false);
      expect(filter.admit(makeRecord({ message: 'request served' }))).toBe(true);
    });

    it('should give the same answer on repeated calls with a global pattern', () => {
      const filter = new RegexFilter(/ok/g);
      const record = makeRecord({ message: 'ok' });

      expect(filter.admit(record)).toBe(true);
      expect(filter.admit(record)).toBe(true);
    });

    it('should reject an invalid pattern at construction', () => {
      expect(() => new RegexFilter('(')).toThrow(ConfigurationError);
    });
  });

  describe('TimeFilter', () => {
    it('should admit times inside an inclusive window', () => {
      const filter = new TimeFilter('09:00', '17:00');

      expect(filter.admit(at(9, 0))).toBe(true);
      expect(filter.admit(at(12, 30))).toBe(true);
      expect(filter.admit(at(17, 0))).toBe(true);
      expect(filter.admit(at(17, 0, 1))).toBe(false);
      expect(filter.admit(at(8, 59, 59))).toBe(false);
    });

    it('should wrap past midnight when start is after end', () => {
      const filter = new TimeFilter('22:00', { hour: 6 });

      expect(filter.admit(at(23, 15))).toBe(true);
      expect(filter.admit(at(0, 0))).toBe(true);
      expect(filter.admit(at(6, 0))).toBe(true);
      expect(filter.admit(at(12, 0))).toBe(false);
    });

    it('should reject malformed times', () => {
      expect(() => new TimeFilter('25:00', '10:00')).toThrow(ConfigurationError);
      expect(() => new TimeFilter('noon', '10:00')).toThrow(
        'Invalid time of day: noon. Expected HH:MM or HH:MM:SS'
      );
    });
  });

  describe('ModuleFilter', () => {
    it('should match the normalised logger name exactly', () => {
      const filter = new ModuleFilter(' App.DB ');

      expect(filter.admit(makeRecord({ loggerName: 'app.db' }))).toBe(true);
      expect(filter.admit(makeRecord({ loggerName: 'app.db.pool' }))).toBe(false);
      expect(filter.admit(makeRecord({ loggerName: 'app' }))).toBe(false);
    });
  });

  describe('CompositeFilter', () => {
    const record = makeRecord();

    it('should admit with an empty list in both modes', () => {
      expect(new CompositeFilter([], 'AND').admit(record)).toBe(true);
      expect(new CompositeFilter([], 'OR').admit(record)).toBe(true);
    });

    it('should mirror a single child in both modes', () => {
      for (const value of [true, false]) {
        expect(new CompositeFilter([constant(value)], 'AND').admit(record)).toBe(value);
        expect(new CompositeFilter([constant(value)], 'OR').admit(record)).toBe(value);
      }
    });

    it('should agree with full evaluation for every combination of three children', () => {
      for (let mask = 0; mask < 8; mask++) {
        const values = [0, 1, 2].map(bit => (mask & (1 << bit)) !== 0);
        const children = values.map(constant);

        expect(new CompositeFilter(children, 'AND').admit(record)).toBe(
          values.every(Boolean)
        );
        expect(new CompositeFilter(children, 'or').admit(record)).toBe(
          values.some(Boolean)
        );
      }
    });

    it('should evaluate children in list order and stop early', () => {
      const calls: string[] = [];
      const tracked = (name: string, value: boolean): Filter => ({
        admit: () => {
          calls.push(name);
          return value;
        },
      });

      new CompositeFilter(
        [tracked('a', true), tracked('b', false), tracked('c', true)],
        'AND'
      ).admit(record);

      expect(calls).toEqual(['a', 'b']);
    });

    it('should reject everything for an unknown mode', () => {
      expect(new CompositeFilter([constant(true)], 'XOR').admit(record)).toBe(false);
      expect(new CompositeFilter([], 'XOR').admit(record)).toBe(false);
    });

    it('should nest composites', () => {
      const filter = new CompositeFilter(
        [
          new LevelFilter(LogLevel.WARNING),
          new CompositeFilter([new ModuleFilter('app'), new ModuleFilter('db')], 'OR'),
        ],
        'AND'
      );

      expect(filter.admit(makeRecord({ level: LogLevel.ERROR, loggerName: 'db' }))).toBe(true);
      expect(filter.admit(makeRecord({ level: LogLevel.ERROR, loggerName: 'web' }))).toBe(false);
      expect(filter.admit(makeRecord({ level: LogLevel.INFO, loggerName: 'app' }))).toBe(false);
    });
  });

  describe('PredicateFilter', () => {
    it('should delegate to the function', () => {
      const filter = new PredicateFilter(record => record.extra.user === 'test-user');

      expect(filter.admit(makeRecord({ extra: { user: 'test-user' } }))).toBe(true);
      expect(filter.admit(makeRecord())).toBe(false);
    });
  });
});
