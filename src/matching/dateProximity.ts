/**
 * Calendar-date arithmetic for reconciliation.
 *
 * Transaction dates are plain calendar dates (YYYY-MM-DD) with no time zone,
 * so all arithmetic happens on UTC day numbers.
 */

import { DATE_WINDOW_DAYS } from './constants';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Returns true for a well-formed, existing calendar date.
 *
 * @example
 * isCalendarDate('2024-02-29') // true
 * isCalendarDate('2023-02-29') // false
 */
export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match;
  const utc = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  return (
    utc.getUTCFullYear() === Number(year) &&
    utc.getUTCMonth() === Number(month) - 1 &&
    utc.getUTCDate() === Number(day)
  );
}

/**
 * Days since the Unix epoch for a YYYY-MM-DD date.
 */
export function toDayNumber(date: string): number {
  const match = CALENDAR_DATE_PATTERN.exec(date);
  if (!match) {
    throw new RangeError(`Invalid calendar date: "${date}"`);
  }

  const [, year, month, day] = match;
  return Math.round(Date.UTC(Number(year), Number(month) - 1, Number(day)) / MS_PER_DAY);
}

/**
 * Absolute number of days between two calendar dates.
 *
 * @example
 * daysBetween('2024-01-01', '2024-01-04') // 3
 * daysBetween('2024-03-01', '2024-02-28') // 2
 */
export function daysBetween(date1: string, date2: string): number {
  return Math.abs(toDayNumber(date1) - toDayNumber(date2));
}

/**
 * True when two dates are at most DATE_WINDOW_DAYS apart (inclusive).
 */
export function isWithinDateWindow(date1: string, date2: string): boolean {
  return daysBetween(date1, date2) <= DATE_WINDOW_DAYS;
}
