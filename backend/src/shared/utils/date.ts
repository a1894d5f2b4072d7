import { DateTime, Info } from 'luxon';

export interface MonthDescriptor {
  key: string;
  year: number;
  month: number;
}

export interface DateWindow {
  start: string;
  end: string;
}

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_KEY_PATTERN = /^(\d{4})-(\d{2})$/;
const LABEL_LOCALE = 'en-US';

const isValidMonth = (year: number, month: number) =>
  Number.isInteger(year) && Number.isInteger(month) && year >= 1 && year <= 9999 && month >= 1 && month <= 12;

const toDateTime = (dateKey: string) => DateTime.fromISO(dateKey, { zone: 'utc' });

/**
 * Normalizes a stored or user supplied date into a `YYYY-MM-DD` key.
 * Accepts ISO dates, ISO date-times and SQL-style date-times; anything else yields null.
 */
export const normalizeDateKey = (value: unknown): string | null => {
  if (value instanceof Date) {
    const fromDate = DateTime.fromJSDate(value, { zone: 'utc' });
    return fromDate.isValid ? fromDate.toISODate() : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const fromIso = DateTime.fromISO(trimmed, { zone: 'utc', setZone: true });
  if (fromIso.isValid) {
    return fromIso.toISODate();
  }
  const fromSql = DateTime.fromSQL(trimmed, { zone: 'utc', setZone: true });
  return fromSql.isValid ? fromSql.toISODate() : null;
};

export const isDateKey = (value: string) => DATE_KEY_PATTERN.test(value) && toDateTime(value).isValid;

// True only for the last calendar day of a month, the one date a monthly snapshot may carry
export const isMonthEndKey = (value: string) =>
  isDateKey(value) && lastDayOfMonth(yearOf(value), Number(value.slice(5, 7))) === value;

export const parseMonthKey = (key: string): MonthDescriptor | null => {
  const match = MONTH_KEY_PATTERN.exec(key.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (!isValidMonth(year, month)) {
    return null;
  }
  return { key: `${match[1]}-${match[2]}`, year, month };
};

export const lastDayOfMonth = (year: number, month: number): string => {
  if (!isValidMonth(year, month)) {
    throw new Error('INVALID_INPUT');
  }
  const end = DateTime.fromObject({ year, month, day: 1 }, { zone: 'utc' }).endOf('month');
  return end.toISODate() ?? `${year}-${String(month).padStart(2, '0')}-${end.day}`;
};

export const firstDayOfMonth = (year: number, month: number): string => {
  if (!isValidMonth(year, month)) {
    throw new Error('INVALID_INPUT');
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-01`;
};

/**
 * Resolves a `YYYY-MM-DD` key as is, or a `YYYY-MM` key to the last day of that month.
 */
export const resolveDateOrMonthKey = (value: string): string | null => {
  const trimmed = value.trim();
  if (isDateKey(trimmed)) {
    return trimmed;
  }
  const month = parseMonthKey(trimmed);
  return month ? lastDayOfMonth(month.year, month.month) : null;
};

export const resolveMonthWindow = (from: MonthDescriptor, to: MonthDescriptor): DateWindow => {
  const start = firstDayOfMonth(from.year, from.month);
  const end = lastDayOfMonth(to.year, to.month);
  if (start > end) {
    throw new Error('INVALID_INPUT');
  }
  return { start, end };
};

export const isWithinWindow = (dateKey: string, window: DateWindow) =>
  dateKey >= window.start && dateKey <= window.end;

// e.g. "Jan 2024"
export const formatMonthLabel = (dateKey: string): string =>
  toDateTime(dateKey).toFormat('LLL yyyy', { locale: LABEL_LOCALE });

export const yearOf = (dateKey: string): number => Number(dateKey.slice(0, 4));

export const listMonthNames = (): string[] => Info.months('long', { locale: LABEL_LOCALE });
