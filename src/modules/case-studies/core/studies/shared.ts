/**
 * Building blocks shared by the case studies.
 */

import { REGION_COLUMN } from '../../../datasets/core/types.js';
import { aggregate, scaleColumn } from '../../../analytics/core/table-ops.js';
import { YEAR_COLUMN } from '../../../../common/types/period.js';

import type { DataTable } from '../../../../common/types/table.js';
import type { MeasureSpec } from '../../../analytics/core/types.js';

export const TOP_N = 10;
export const AMOUNT_MILLIONS = 'Amount_M';

/**
 * Per-state sums of the given measures.
 */
export const sumByState = (table: DataTable, fields: readonly string[]): DataTable =>
  aggregate(table, {
    groupBy: [REGION_COLUMN],
    measures: fields.map((field): MeasureSpec => ({ field, fn: 'sum' })),
  });

/**
 * Per-state sum of an amount, with the same amount in millions as `Amount_M`.
 */
export const stateAmountsInMillions = (
  table: DataTable,
  amountField: string,
  extraFields: readonly string[] = []
): DataTable =>
  scaleColumn(sumByState(table, [amountField, ...extraFields]), amountField, AMOUNT_MILLIONS, 1e6);

export const sumBy = (table: DataTable, groupBy: string, field: string): DataTable =>
  aggregate(table, { groupBy: [groupBy], measures: [{ field, fn: 'sum' }] });

export const yearlyTotals = (table: DataTable, field: string): DataTable =>
  sumBy(table, YEAR_COLUMN, field);
