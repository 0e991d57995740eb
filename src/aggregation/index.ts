export { toMetricValue, toWeightValue } from './coerce';
export {
  DEFAULT_VIEW,
  availableGroupings,
  buildDashboard,
  goalProgress,
  latestWeight,
  resolveGrouping,
} from './dashboard';
export { countUnreadableDates, filterByPeriod, narrowToRange } from './filter';
export { groupBy, toSeries } from './grouping';
export { sortRecords } from './sort';
export { computeAllStats, computeStats } from './stats';
