/**
 * Dashboard view model type definitions.
 */

import type {
  DateSelection,
  Granularity,
  GroupedSeries,
  MetricKey,
  Period,
  RangeStatistics,
  SortOrder,
} from './aggregation';
import type { HealthRecordDto } from './health';

/**
 * Everything the dashboard lets the user change, passed explicitly into
 * the aggregation functions.
 */
export interface DashboardView {
  period: Period;
  groupBy: Granularity;
  sort: SortOrder;
  selection: DateSelection | null;
}

export type GoalMetric = 'flights_climbed' | 'kcals' | 'km' | 'steps';

export interface DashboardSummary {
  view: DashboardView;
  availableGroupings: Granularity[];
  series: GroupedSeries;
  stats: Record<MetricKey, RangeStatistics>;
  daysTracked: number;
  latestWeight: number | null;
  rows: HealthRecordDto[];
  lastUpdated: string | null;
  today: HealthRecordDto | null;
  goals: Record<GoalMetric, number>;
  goalProgress: Record<GoalMetric, number>;
}
