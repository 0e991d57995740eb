import { DashboardConfig } from '../config';
import { toDateKey } from '../utils/dateUtilities';
import { toMetricValue, toWeightValue } from './coerce';
import { filterByPeriod, narrowToRange } from './filter';
import { groupBy, toSeries } from './grouping';
import { sortRecords } from './sort';
import { computeAllStats } from './stats';

import type {
  DashboardSummary,
  DashboardView,
  GoalMetric,
  Granularity,
  HealthRecordDto,
  Period,
  RecordLike,
} from '../types';

export const DEFAULT_VIEW: DashboardView = {
  groupBy: 'day',
  period: 'month',
  selection: null,
  sort: { column: 'date', direction: 'desc' },
};

const GROUPINGS_BY_PERIOD: Record<Period, Granularity[]> = {
  all: ['day', 'week', 'month'],
  month: ['day', 'week'],
  week: ['day'],
  year: ['day', 'week', 'month'],
};

// Coarsest sensible grouping when the requested one is not offered
const FALLBACK_GROUPING: Record<Period, Granularity> = {
  all: 'month',
  month: 'week',
  week: 'day',
  year: 'month',
};

export function availableGroupings(period: Period): Granularity[] {
  return [...GROUPINGS_BY_PERIOD[period]];
}

export function resolveGrouping(period: Period, requested: Granularity = DEFAULT_VIEW.groupBy): Granularity {
  return GROUPINGS_BY_PERIOD[period].includes(requested) ? requested : FALLBACK_GROUPING[period];
}

/**
 * Most recent positive weight across the whole history, regardless of the
 * period being viewed.
 */
export function latestWeight(records: readonly RecordLike[]): number | null {
  let latest: { dateKey: string; weight: number } | null = null;
  for (const record of records) {
    const dateKey = toDateKey(record.date);
    const weight = toWeightValue(record.weight);
    if (dateKey === undefined || weight === null) continue;
    if (!latest || dateKey >= latest.dateKey) {
      latest = { dateKey, weight };
    }
  }
  return latest?.weight ?? null;
}

/**
 * Percentage of each daily goal reached, capped at 100.
 */
export function goalProgress(
  record: RecordLike | null,
  goals: Record<GoalMetric, number> = DashboardConfig.goals,
): Record<GoalMetric, number> {
  const percent = (metric: GoalMetric): number =>
    goals[metric] > 0 ? Math.min(100, Math.round((toMetricValue(record?.[metric]) / goals[metric]) * 100)) : 0;

  return {
    flights_climbed: percent('flights_climbed'),
    kcals: percent('kcals'),
    km: percent('km'),
    steps: percent('steps'),
  };
}

/**
 * Everything the dashboard renders for one view of the history.
 *
 * The chart series covers the period; the statistics cover the period
 * narrowed by the selection; the table covers the whole history.
 */
export function buildDashboard(
  records: readonly HealthRecordDto[],
  view: DashboardView,
  today: string,
  goals: Record<GoalMetric, number> = DashboardConfig.goals,
): DashboardSummary {
  const grouping = resolveGrouping(view.period, view.groupBy);
  const inPeriod = filterByPeriod(records, view.period, today);
  const selected = narrowToRange(inPeriod, view.selection);

  const newest = sortRecords(records, 'date', 'desc').at(0);
  const todayRecord = records.find((record) => toDateKey(record.date) === today) ?? null;

  return {
    availableGroupings: availableGroupings(view.period),
    daysTracked: selected.length,
    goalProgress: goalProgress(todayRecord, goals),
    goals: { ...goals },
    lastUpdated: newest?.recorded_at ?? null,
    latestWeight: latestWeight(records),
    rows: sortRecords(records, view.sort.column, view.sort.direction),
    series: toSeries(grouping, groupBy(inPeriod, grouping)),
    stats: computeAllStats(selected),
    today: todayRecord,
    view: { ...view, groupBy: grouping },
  };
}
