/**
 * Date helpers. Calendar dates travel as YYYY-MM-DD keys; arithmetic on
 * them goes through date-fns on local-midnight Date objects.
 */

import { addDays, format, startOfWeek } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_KEY_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

/**
 * Today's calendar date in the given IANA timezone.
 */
export function getTodayKey(timeZone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timeZone, 'yyyy-MM-dd');
}

/**
 * Format an instant as ISO 8601 with the zone's numeric offset.
 * Output format: "2026-01-26T06:33:44-06:00" (never "Z").
 */
export function formatRecordedAt(now: Date, timeZone: string): string {
  return formatInTimeZone(now, timeZone, "yyyy-MM-dd'T'HH:mm:ssxxx");
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a YYYY-MM-DD key into a local-midnight Date.
 * Returns undefined for bad formats and dates that do not exist (2025-02-30).
 */
export function tryParseDateKey(dateKey: string): Date | undefined {
  const match = DATE_KEY_PATTERN.exec(dateKey);
  if (!match) return undefined;

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10) - 1;
  const day = Number.parseInt(match[3], 10);
  const date = new Date(year, month, day);

  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * @throws Error if dateKey is not a real YYYY-MM-DD date
 */
export function parseDateKey(dateKey: string): Date {
  const date = tryParseDateKey(dateKey);
  if (!date) {
    throw new Error(`Invalid date key: ${dateKey}. Expected an existing YYYY-MM-DD date`);
  }
  return date;
}

export function isDateKey(value: string): boolean {
  return tryParseDateKey(value) !== undefined;
}

/**
 * Normalize a record's date field to YYYY-MM-DD.
 *
 * Strings keep their leading calendar date ("2026-01-05T10:00:00+01:00" is
 * 2026-01-05). Date objects use their UTC date. Anything else is undefined.
 */
export function toDateKey(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const match = DATE_KEY_PREFIX.exec(value.trim());
    return match && isDateKey(match[1]) ? match[1] : undefined;
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString().slice(0, 10);
  }
  return undefined;
}

export function shiftDateKey(dateKey: string, days: number): string {
  return format(addDays(parseDateKey(dateKey), days), 'yyyy-MM-dd');
}

/**
 * Monday of the ISO week containing the date, as YYYY-MM-DD.
 */
export function getWeekKey(dateKey: string): string {
  return format(startOfWeek(parseDateKey(dateKey), { weekStartsOn: 1 }), 'yyyy-MM-dd');
}

/**
 * YYYY-MM
 */
export function getMonthKey(dateKey: string): string {
  return dateKey.slice(0, 7);
}
