/**
 * Calendar date helpers
 * Dates travel through the CLI as local `YYYY-MM-DD` strings.
 */

import { ValidationError } from './errors.js';

export const DEFAULT_RANGE_DAYS = 7;
export const MAX_RANGE_DAYS = 366;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

const pad = (n: number): string => String(n).padStart(2, '0');

function splitDate(date: string): [number, number, number] | null {
  const match = DATE_PATTERN.exec(date);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/**
 * Validate a `YYYY-MM-DD` flag value, rejecting impossible dates like 2025-02-30
 */
export function parseDate(value: string, flag = '--date'): string {
  const parts = splitDate(value);
  if (!parts) {
    throw new ValidationError(`Invalid value for ${flag}: ${value} (expected YYYY-MM-DD)`);
  }
  const [year, month, day] = parts;
  const utc = new Date(Date.UTC(year, month - 1, day));
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day
  ) {
    throw new ValidationError(`Invalid value for ${flag}: ${value} is not a calendar date`);
  }
  return value;
}

/** Local calendar date of a timestamp */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function today(now: Date = new Date()): string {
  return formatDate(now);
}

export function addDays(date: string, days: number): string {
  const parts = splitDate(date);
  if (!parts) {
    throw new ValidationError(`Invalid date: ${date}`);
  }
  const [year, month, day] = parts;
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/**
 * Every date from start to end, inclusive
 */
export function eachDate(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

export interface DateRange {
  start: string;
  end: string;
}

/**
 * Resolve optional --start/--end flags. A missing end is today; a missing
 * start is DEFAULT_RANGE_DAYS days before the end.
 */
export function resolveRange(
  start: string | undefined,
  end: string | undefined,
  now: Date = new Date()
): DateRange {
  const resolvedEnd = end ? parseDate(end, '--end') : today(now);
  const resolvedStart = start ? parseDate(start, '--start') : addDays(resolvedEnd, -DEFAULT_RANGE_DAYS);

  if (resolvedStart > resolvedEnd) {
    throw new ValidationError(`--start (${resolvedStart}) must not be after --end (${resolvedEnd})`);
  }
  if (eachDate(resolvedStart, resolvedEnd).length > MAX_RANGE_DAYS) {
    throw new ValidationError(`Date range too long: at most ${MAX_RANGE_DAYS} days`);
  }
  return { start: resolvedStart, end: resolvedEnd };
}

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export function parseTime(value: string): TimeOfDay {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`--time must be in HH:MM format: ${value}`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new ValidationError(`Invalid time: ${value}`);
  }
  return { hour, minute };
}

/**
 * Timestamp for a new log entry.
 * An explicit --time wins; otherwise now for today's date and noon for any other day.
 */
export function makeLoggedAt(date: string, time: string | undefined, now: Date = new Date()): Date {
  const parts = splitDate(parseDate(date));
  if (!parts) {
    throw new ValidationError(`Invalid date: ${date}`);
  }
  const [year, month, day] = parts;

  if (time !== undefined) {
    const { hour, minute } = parseTime(time);
    return new Date(year, month - 1, day, hour, minute, 0);
  }
  if (date === today(now)) {
    return now;
  }
  return new Date(year, month - 1, day, 12, 0, 0);
}

/** Monday = 0 ... Sunday = 6 */
export function weekdayIndex(now: Date = new Date()): number {
  return (now.getDay() + 6) % 7;
}

export const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;
