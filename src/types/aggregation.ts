/**
 * Aggregation engine type definitions.
 */

export type Period = 'all' | 'month' | 'week' | 'year';

export type Granularity = 'day' | 'month' | 'week';

/** Metrics that are averaged over positive values when bucketed */
export type AveragedMetric = 'flights_climbed' | 'kcals' | 'km' | 'steps';

export type MetricKey = AveragedMetric | 'weight';

export type SortColumn = MetricKey | 'date';

export type SortDirection = 'asc' | 'desc';

/**
 * Anything shaped like a health record. Every field may be missing or
 * malformed; the engine coerces instead of failing.
 */
export interface RecordLike {
  date?: unknown;
  steps?: unknown;
  kcals?: unknown;
  km?: unknown;
  flights_climbed?: unknown;
  weight?: unknown;
  recorded_at?: unknown;
}

export interface BucketSummary {
  /** YYYY-MM-DD for day and week (the Monday), YYYY-MM for month */
  key: string;
  /** Records that fell into the bucket */
  count: number;
  steps: number;
  kcals: number;
  km: number;
  flights_climbed: number;
  weight: number | null;
}

export interface GroupedSeries {
  granularity: Granularity;
  keys: string[];
  steps: number[];
  kcals: number[];
  km: number[];
  flights_climbed: number[];
  weight: (number | null)[];
}

export interface RangeStatistics {
  min: number;
  max: number;
  avg: number;
  total: number;
}

export interface DateSelection {
  start: string | null;
  end: string | null;
}

export interface SortOrder {
  column: SortColumn;
  direction: SortDirection;
}
