/**
 * Unit tests for month and date-key utilities.
 */

import { describe, test, expect } from 'vitest';
import {
  formatMonthLabel,
  isDateKey,
  isMonthEndKey,
  isWithinWindow,
  lastDayOfMonth,
  listMonthNames,
  normalizeDateKey,
  parseMonthKey,
  resolveDateOrMonthKey,
  resolveMonthWindow
} from '../../src/shared/utils/date.js';

describe('lastDayOfMonth', () => {
  test('returns the last calendar day of the month', () => {
    expect(lastDayOfMonth(2024, 1)).toBe('2024-01-31');
    expect(lastDayOfMonth(2024, 4)).toBe('2024-04-30');
    expect(lastDayOfMonth(2024, 12)).toBe('2024-12-31');
  });

  test('handles leap years', () => {
    expect(lastDayOfMonth(2024, 2)).toBe('2024-02-29');
    expect(lastDayOfMonth(2023, 2)).toBe('2023-02-28');
    expect(lastDayOfMonth(2000, 2)).toBe('2000-02-29');
    expect(lastDayOfMonth(1900, 2)).toBe('1900-02-28');
  });

  test('rejects months outside 1..12', () => {
    expect(() => lastDayOfMonth(2024, 0)).toThrow('INVALID_INPUT');
    expect(() => lastDayOfMonth(2024, 13)).toThrow('INVALID_INPUT');
    expect(() => lastDayOfMonth(2024.5, 1)).toThrow('INVALID_INPUT');
  });
});

describe('normalizeDateKey', () => {
  test('keeps ISO dates', () => {
    expect(normalizeDateKey('2024-01-31')).toBe('2024-01-31');
    expect(normalizeDateKey('  2024-01-31  ')).toBe('2024-01-31');
  });

  test('drops the time part of date-times', () => {
    expect(normalizeDateKey('2024-01-31T00:00:00')).toBe('2024-01-31');
    expect(normalizeDateKey('2024-01-31 00:00:00')).toBe('2024-01-31');
  });

  test('keeps the calendar day of an offset date-time', () => {
    expect(normalizeDateKey('2024-01-31T23:30:00-05:00')).toBe('2024-01-31');
  });

  test('accepts Date instances', () => {
    expect(normalizeDateKey(new Date(Date.UTC(2024, 2, 31)))).toBe('2024-03-31');
  });

  test('returns null for unreadable values', () => {
    expect(normalizeDateKey('not a date')).toBeNull();
    expect(normalizeDateKey('2024-02-30')).toBeNull();
    expect(normalizeDateKey('')).toBeNull();
    expect(normalizeDateKey(undefined)).toBeNull();
    expect(normalizeDateKey(20240131)).toBeNull();
  });
});

describe('isDateKey', () => {
  test('requires a real YYYY-MM-DD day', () => {
    expect(isDateKey('2024-02-29')).toBe(true);
    expect(isDateKey('2023-02-29')).toBe(false);
    expect(isDateKey('2024-1-31')).toBe(false);
    expect(isDateKey('2024-01-31T00:00:00')).toBe(false);
  });
});

describe('isMonthEndKey', () => {
  test('accepts only the last day of the month', () => {
    expect(isMonthEndKey('2024-02-29')).toBe(true);
    expect(isMonthEndKey('2023-02-28')).toBe(true);
    expect(isMonthEndKey('2024-02-28')).toBe(false);
    expect(isMonthEndKey('2024-01-15')).toBe(false);
    expect(isMonthEndKey('2024-02')).toBe(false);
  });
});

describe('parseMonthKey', () => {
  test('parses YYYY-MM', () => {
    expect(parseMonthKey('2024-03')).toEqual({ key: '2024-03', year: 2024, month: 3 });
  });

  test('rejects malformed keys', () => {
    expect(parseMonthKey('2024-13')).toBeNull();
    expect(parseMonthKey('2024-3')).toBeNull();
    expect(parseMonthKey('Mar 2024')).toBeNull();
  });
});

describe('resolveDateOrMonthKey', () => {
  test('keeps an exact date', () => {
    expect(resolveDateOrMonthKey('2024-01-15')).toBe('2024-01-15');
  });

  test('resolves a month to its last day', () => {
    expect(resolveDateOrMonthKey('2024-02')).toBe('2024-02-29');
  });

  test('never re-parses display labels', () => {
    expect(resolveDateOrMonthKey('Jan 2024')).toBeNull();
    expect(resolveDateOrMonthKey('2024-02-30')).toBeNull();
  });
});

describe('resolveMonthWindow', () => {
  test('spans from the first day of the first month to the last day of the last', () => {
    expect(resolveMonthWindow({ key: '2023-11', year: 2023, month: 11 }, { key: '2024-02', year: 2024, month: 2 })).toEqual({
      start: '2023-11-01',
      end: '2024-02-29'
    });
  });

  test('rejects an inverted range', () => {
    expect(() =>
      resolveMonthWindow({ key: '2024-03', year: 2024, month: 3 }, { key: '2024-01', year: 2024, month: 1 })
    ).toThrow('INVALID_INPUT');
  });

  test('window bounds are inclusive', () => {
    const window = { start: '2024-01-01', end: '2024-01-31' };
    expect(isWithinWindow('2024-01-01', window)).toBe(true);
    expect(isWithinWindow('2024-01-31', window)).toBe(true);
    expect(isWithinWindow('2024-02-29', window)).toBe(false);
  });
});

describe('labels', () => {
  test('formats month labels', () => {
    expect(formatMonthLabel('2024-01-31')).toBe('Jan 2024');
    expect(formatMonthLabel('2023-09-30')).toBe('Sep 2023');
  });

  test('lists month names', () => {
    const names = listMonthNames();
    expect(names).toHaveLength(12);
    expect(names[0]).toBe('January');
    expect(names[11]).toBe('December');
  });
});
