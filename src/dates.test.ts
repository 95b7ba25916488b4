/**
 * Tests for date helpers
 */

import { describe, it, expect } from 'vitest';
import {
  addDays,
  eachDate,
  makeLoggedAt,
  parseDate,
  parseTime,
  resolveRange,
  today,
  weekdayIndex,
} from './dates.js';
import { ValidationError } from './errors.js';

describe('dates', () => {
  const now = new Date(2025, 0, 15, 9, 30);

  describe('parseDate', () => {
    it('should accept a calendar date', () => {
      expect(parseDate('2024-02-29')).toBe('2024-02-29');
    });

    it('should reject dates that do not exist', () => {
      expect(() => parseDate('2025-02-30')).toThrow(
        'Invalid value for --date: 2025-02-30 is not a calendar date'
      );
    });

    it('should reject other formats and name the flag', () => {
      expect(() => parseDate('2025-1-5', '--start')).toThrow(
        'Invalid value for --start: 2025-1-5 (expected YYYY-MM-DD)'
      );
      expect(() => parseDate('yesterday')).toThrow(ValidationError);
    });
  });

  describe('addDays / eachDate', () => {
    it('should cross month and year boundaries', () => {
      expect(addDays('2025-01-01', -7)).toBe('2024-12-25');
      expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    });

    it('should list every date inclusively', () => {
      expect(eachDate('2025-01-30', '2025-02-02')).toEqual([
        '2025-01-30',
        '2025-01-31',
        '2025-02-01',
        '2025-02-02',
      ]);
      expect(eachDate('2025-01-02', '2025-01-01')).toEqual([]);
    });
  });

  describe('resolveRange', () => {
    it('should default to the last 7 days ending today', () => {
      expect(today(now)).toBe('2025-01-15');
      expect(resolveRange(undefined, undefined, now)).toEqual({
        start: '2025-01-08',
        end: '2025-01-15',
      });
    });

    it('should keep explicit bounds', () => {
      expect(resolveRange('2025-01-01', '2025-01-03', now)).toEqual({
        start: '2025-01-01',
        end: '2025-01-03',
      });
    });

    it('should count the default start back from an explicit end', () => {
      expect(resolveRange(undefined, '2025-01-15', new Date(2025, 5, 1))).toEqual({
        start: '2025-01-08',
        end: '2025-01-15',
      });
    });

    it('should reject a start after the end', () => {
      expect(() => resolveRange('2025-01-10', '2025-01-05', now)).toThrow(
        '--start (2025-01-10) must not be after --end (2025-01-05)'
      );
    });

    it('should reject ranges longer than a year', () => {
      expect(() => resolveRange('2024-01-01', '2025-12-31', now)).toThrow('Date range too long');
    });
  });

  describe('parseTime', () => {
    it('should parse HH:MM', () => {
      expect(parseTime('7:05')).toEqual({ hour: 7, minute: 5 });
      expect(parseTime('23:59')).toEqual({ hour: 23, minute: 59 });
    });

    it('should reject out-of-range and malformed times', () => {
      expect(() => parseTime('24:00')).toThrow('Invalid time: 24:00');
      expect(() => parseTime('7pm')).toThrow('--time must be in HH:MM format: 7pm');
    });
  });

  describe('makeLoggedAt', () => {
    it('should combine the date with an explicit time', () => {
      expect(makeLoggedAt('2025-01-10', '08:30', now).getTime()).toBe(
        new Date(2025, 0, 10, 8, 30).getTime()
      );
    });

    it('should use the current time for today', () => {
      expect(makeLoggedAt('2025-01-15', undefined, now)).toBe(now);
    });

    it('should use noon for other days', () => {
      expect(makeLoggedAt('2025-01-10', undefined, now).getTime()).toBe(
        new Date(2025, 0, 10, 12, 0).getTime()
      );
    });
  });

  describe('weekdayIndex', () => {
    it('should count from Monday', () => {
      expect(weekdayIndex(new Date(2025, 0, 13))).toBe(0);
      expect(weekdayIndex(new Date(2025, 0, 19))).toBe(6);
    });
  });
});
