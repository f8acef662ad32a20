/**
 * Analytics Module - Public API
 */

export type {
  AggregateFn,
  MeasureSpec,
  AggregateOptions,
  SortOrder,
  TopNOptions,
  RatioGuard,
  RatioOptions,
  PeriodAvailability,
} from './core/types.js';

export {
  compareCells,
  filterRows,
  filterEquals,
  aggregate,
  deriveColumn,
  scaleColumn,
  withRatio,
  topN,
  sumColumn,
  distinctValues,
} from './core/table-ops.js';

export { availablePeriods, latestPeriod, selectPeriod, selectYear } from './core/periods.js';
