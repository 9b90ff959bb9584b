/**
 * Calendar-date utilities for trading sessions.
 *
 * Dates are plain YYYY-MM-DD strings in exchange-local terms. They are parsed
 * as local calendar days only for arithmetic and formatted straight back, so
 * the host timezone never leaks into a result.
 */

import { addDays, format, isValid, isWeekend, parse } from 'date-fns';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DATE_FORMAT = 'yyyy-MM-dd';

function toCalendarDay(date: string): Date {
  return parse(date, DATE_FORMAT, new Date(2000, 0, 1));
}

/**
 * Strict YYYY-MM-DD check; rejects overflow dates such as 2024-02-30
 */
export function isValidTradingDate(input: string): boolean {
  if (!DATE_PATTERN.test(input)) return false;
  const day = toCalendarDay(input);
  return isValid(day) && format(day, DATE_FORMAT) === input;
}

export function addCalendarDays(date: string, days: number): string {
  return format(addDays(toCalendarDay(date), days), DATE_FORMAT);
}

export function isWeekendDate(date: string): boolean {
  return isWeekend(toCalendarDay(date));
}

/**
 * Saturday and Sunday roll back to the preceding Friday
 */
export function rollBackToBusinessDay(date: string): string {
  let current = date;
  while (isWeekendDate(current)) {
    current = addCalendarDays(current, -1);
  }
  return current;
}

/**
 * The `count` most recent business days ending at `date`, oldest first
 */
export function trailingBusinessDays(date: string, count: number): string[] {
  const days: string[] = [];
  let current = date;

  while (days.length < count) {
    if (!isWeekendDate(current)) {
      days.unshift(current);
    }
    current = addCalendarDays(current, -1);
  }

  return days;
}
