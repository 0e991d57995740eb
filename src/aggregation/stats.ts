import { toMetricValue } from './coerce';

import type { MetricKey, RangeStatistics, RecordLike } from '../types';

const EMPTY_STATS: RangeStatistics = { avg: 0, max: 0, min: 0, total: 0 };

/**
 * Min, max, average and total of a metric over the records where it is
 * positive. Zero, missing and non-numeric values are left out entirely.
 */
export function computeStats(records: readonly RecordLike[], metric: MetricKey): RangeStatistics {
  let total = 0;
  let count = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const record of records) {
    const value = toMetricValue(record[metric]);
    if (value <= 0) continue;
    total += value;
    count += 1;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }

  if (count === 0) return { ...EMPTY_STATS };
  return { avg: total / count, max, min, total };
}

export function computeAllStats(records: readonly RecordLike[]): Record<MetricKey, RangeStatistics> {
  return {
    flights_climbed: computeStats(records, 'flights_climbed'),
    kcals: computeStats(records, 'kcals'),
    km: computeStats(records, 'km'),
    steps: computeStats(records, 'steps'),
    weight: computeStats(records, 'weight'),
  };
}
