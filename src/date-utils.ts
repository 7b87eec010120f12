import dayjs, { type Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import advancedFormat from 'dayjs/plugin/advancedFormat.js';
import isoWeek from 'dayjs/plugin/isoWeek.js';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(advancedFormat);
dayjs.extend(isoWeek);
dayjs.extend(customParseFormat);

export const FORMAT_DATE = 'YYYY-MM-DD';
export const FORMAT_MONTH = 'YYYY-MM';
export const FORMAT_YEAR = 'YYYY';
export const FORMAT_DATE_DAY = 'MMM Do';
export const FORMAT_DATE_DAY_YEAR = 'MMM Do, YYYY';

// Hours are summed in millionths of an hour so totals don't pick up float noise.
const HOURS_SCALE = 1_000_000;

/**
 * Parses `value` against `pattern` in strict mode. Returns null when the value
 * doesn't match the pattern exactly or names a date that doesn't exist.
 */
export function parseStrict(value: string, pattern: string): Dayjs | null {
  const parsed = dayjs(value, pattern, true);
  return parsed.isValid() ? parsed : null;
}

export function isValidDateString(dateString?: string): boolean {
  if (!dateString) return false;
  return parseStrict(dateString, FORMAT_DATE) !== null;
}

export function today(tz?: string): string {
  return tz ? dayjs().tz(tz).format(FORMAT_DATE) : dayjs().format(FORMAT_DATE);
}

export function addDays(date: string, days: number): string {
  return dayjs(date, FORMAT_DATE).add(days, 'day').format(FORMAT_DATE);
}

export function getWeekStart(date: Dayjs): Dayjs {
  return date.startOf('isoWeek');
}

export function getWeekEnd(date: Dayjs): Dayjs {
  return date.endOf('isoWeek');
}

// Dates are canonical YYYY-MM-DD strings, so lexical order is chronological order.
export function isDateInRange(date: string, startDate: string, endDate: string): boolean {
  return date >= startDate && date <= endDate;
}

export function sumHours(values: number[]): number {
  const scaled = values.reduce((total, hours) => total + Math.round(hours * HOURS_SCALE), 0);
  return scaled / HOURS_SCALE;
}

export function formatHours(hours: number): string {
  return hours.toFixed(2);
}

export { dayjs };
