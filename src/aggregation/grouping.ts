import { getMonthKey, getWeekKey, toDateKey } from '../utils/dateUtilities';
import { toMetricValue, toWeightValue } from './coerce';

import type { AveragedMetric, BucketSummary, Granularity, GroupedSeries, RecordLike } from '../types';

const bucketKeyOf: Record<Granularity, (dateKey: string) => string> = {
  day: (dateKey) => dateKey,
  month: getMonthKey,
  week: getWeekKey,
};

interface DatedRecord {
  dateKey: string;
  record: RecordLike;
}

function submittedAt(record: RecordLike): number {
  const parsed = typeof record.recorded_at === 'string' ? Date.parse(record.recorded_at) : Number.NaN;
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Readable records in ascending date order, ties broken by `recorded_at`.
 */
function inSubmissionOrder(records: readonly RecordLike[]): DatedRecord[] {
  const dated: DatedRecord[] = [];
  for (const record of records) {
    const dateKey = toDateKey(record.date);
    if (dateKey !== undefined) dated.push({ dateKey, record });
  }

  return dated.sort((a, b) => {
    if (a.dateKey !== b.dateKey) return a.dateKey < b.dateKey ? -1 : 1;
    const aTime = submittedAt(a.record);
    const bTime = submittedAt(b.record);
    if (aTime === bTime) return 0;
    return aTime < bTime ? -1 : 1;
  });
}

// A day bucket is the day's own values; later duplicates of a date replace earlier ones
function dayBucket(key: string, members: readonly RecordLike[]): BucketSummary {
  const latest: RecordLike = members.at(-1) ?? {};
  return {
    count: members.length,
    flights_climbed: toMetricValue(latest.flights_climbed),
    kcals: toMetricValue(latest.kcals),
    key,
    km: toMetricValue(latest.km),
    steps: toMetricValue(latest.steps),
    weight: toWeightValue(latest.weight),
  };
}

function averagePositive(members: readonly RecordLike[], metric: AveragedMetric): number {
  let total = 0;
  let count = 0;
  for (const member of members) {
    const value = toMetricValue(member[metric]);
    if (value > 0) {
      total += value;
      count += 1;
    }
  }
  return count > 0 ? total / count : 0;
}

function periodBucket(key: string, members: readonly RecordLike[]): BucketSummary {
  // Weight is a reading, not a total: keep the latest one
  let weight: number | null = null;
  for (const member of members) {
    weight = toWeightValue(member.weight) ?? weight;
  }

  return {
    count: members.length,
    flights_climbed: averagePositive(members, 'flights_climbed'),
    kcals: averagePositive(members, 'kcals'),
    key,
    km: averagePositive(members, 'km'),
    steps: averagePositive(members, 'steps'),
    weight,
  };
}

/**
 * Bucket records by day, ISO week (keyed by its Monday) or calendar month,
 * in ascending key order.
 *
 * Week and month buckets average each metric over the records where it is
 * positive, so days without data do not drag the average down. Records with
 * unreadable dates are skipped.
 */
export function groupBy(records: readonly RecordLike[], granularity: Granularity): BucketSummary[] {
  const buckets = new Map<string, RecordLike[]>();

  for (const { dateKey, record } of inSubmissionOrder(records)) {
    const key = bucketKeyOf[granularity](dateKey);
    const members = buckets.get(key);
    if (members) {
      members.push(record);
    } else {
      buckets.set(key, [record]);
    }
  }

  const summarize = granularity === 'day' ? dayBucket : periodBucket;
  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, members]) => summarize(key, members));
}

/**
 * Column-oriented form of the buckets, one array per metric, for charting.
 */
export function toSeries(granularity: Granularity, buckets: readonly BucketSummary[]): GroupedSeries {
  return {
    flights_climbed: buckets.map((bucket) => bucket.flights_climbed),
    granularity,
    kcals: buckets.map((bucket) => bucket.kcals),
    keys: buckets.map((bucket) => bucket.key),
    km: buckets.map((bucket) => bucket.km),
    steps: buckets.map((bucket) => bucket.steps),
    weight: buckets.map((bucket) => bucket.weight),
  };
}
