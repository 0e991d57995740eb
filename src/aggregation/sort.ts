import { toDateKey } from '../utils/dateUtilities';
import { toMetricValue } from './coerce';

import type { RecordLike, SortColumn, SortDirection } from '../types';

/**
 * Stable sort for the activity table. Dates compare as YYYY-MM-DD strings
 * (unreadable dates as ""), metrics as numbers (non-numeric as 0).
 */
export function sortRecords<T extends RecordLike>(
  records: readonly T[],
  column: SortColumn,
  direction: SortDirection,
): T[] {
  const multiplier = direction === 'asc' ? 1 : -1;

  const compare =
    column === 'date'
      ? (a: T, b: T) => (toDateKey(a.date) ?? '').localeCompare(toDateKey(b.date) ?? '')
      : (a: T, b: T) => toMetricValue(a[column]) - toMetricValue(b[column]);

  return [...records].sort((a, b) => compare(a, b) * multiplier);
}
