import { DashboardConfig } from '../config';
import { shiftDateKey, toDateKey } from '../utils/dateUtilities';

import type { DateSelection, Period, RecordLike } from '../types';

/**
 * Keep records inside the trailing window ending at `today` (inclusive of
 * the cutoff day). `all` keeps everything, unreadable dates included; so
 * does an unreadable `today`.
 */
export function filterByPeriod<T extends RecordLike>(
  records: readonly T[],
  period: Period,
  today: string,
): T[] {
  const todayKey = toDateKey(today);
  if (period === 'all' || todayKey === undefined) return [...records];

  const cutoff = shiftDateKey(todayKey, -DashboardConfig.periodDays[period]);
  return records.filter((record) => {
    const dateKey = toDateKey(record.date);
    return dateKey !== undefined && dateKey >= cutoff;
  });
}

/**
 * Narrow to an inclusive [start, end] selection. A selection missing either
 * bound, or with an unreadable bound, leaves the records as they are.
 */
export function narrowToRange<T extends RecordLike>(
  records: readonly T[],
  selection: DateSelection | null,
): T[] {
  const first = toDateKey(selection?.start);
  const second = toDateKey(selection?.end);
  if (first === undefined || second === undefined) return [...records];

  const [start, end] = first <= second ? [first, second] : [second, first];
  return records.filter((record) => {
    const dateKey = toDateKey(record.date);
    return dateKey !== undefined && dateKey >= start && dateKey <= end;
  });
}

/**
 * Records whose date cannot be read at all.
 */
export function countUnreadableDates(records: readonly RecordLike[]): number {
  return records.filter((record) => toDateKey(record.date) === undefined).length;
}
