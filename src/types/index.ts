/**
 * Centralized type exports.
 */

// Aggregation types
export type {
  AveragedMetric,
  BucketSummary,
  DateSelection,
  Granularity,
  GroupedSeries,
  MetricKey,
  Period,
  RangeStatistics,
  RecordLike,
  SortColumn,
  SortDirection,
  SortOrder,
} from './aggregation';

// API types
export type { DumpSuccessResponse, ErrorResponse, HealthDataResponse } from './api';

// Dashboard types
export type { DashboardSummary, DashboardView, GoalMetric } from './dashboard';

// Health record types
export type {
  DateRange,
  HealthRecord,
  HealthRecordDto,
  HealthSubmission,
  SubmitResult,
} from './health';
