/**
 * Analytics Module - Core Types
 *
 * Options for the table operations used to prepare chart data.
 */

export type AggregateFn = 'sum' | 'mean' | 'count';

export interface MeasureSpec {
  /** Source column */
  field: string;
  fn: AggregateFn;
  /** Output column name. Defaults to `field` */
  as?: string;
}

export interface AggregateOptions {
  groupBy: readonly string[];
  measures: readonly MeasureSpec[];
}

export type SortOrder = 'desc' | 'asc';

export interface TopNOptions {
  /** Measure column to rank by */
  by: string;
  n: number;
  /** Default: 'desc' (largest first) */
  order?: SortOrder;
}

/**
 * How a ratio treats a zero (or missing) denominator.
 * - `add-one`:   numerator / (denominator + 1)
 * - `skip`:      the row is dropped
 * - `zero-fill`: the ratio is 0
 */
export type RatioGuard = 'add-one' | 'skip' | 'zero-fill';

export interface RatioOptions {
  numerator: string;
  denominator: string;
  as: string;
  guard: RatioGuard;
}

export interface PeriodAvailability {
  year: number;
  quarters: number[];
}
