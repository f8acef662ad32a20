import { QUARTER_COLUMN, YEAR_COLUMN, type Period } from '../../../common/types/period.js';
import { toNumber, type DataTable } from '../../../common/types/table.js';

import { filterEquals } from './table-ops.js';

import type { PeriodAvailability } from './types.js';

/**
 * Years present in the table, each with its quarters, both ascending.
 */
export const availablePeriods = (table: DataTable): PeriodAvailability[] => {
  const byYear = new Map<number, Set<number>>();

  for (const row of table.rows) {
    const year = toNumber(row[YEAR_COLUMN]);
    if (year === null) continue;

    const quarters = byYear.get(year) ?? new Set<number>();
    const quarter = toNumber(row[QUARTER_COLUMN]);
    if (quarter !== null) quarters.add(quarter);
    byYear.set(year, quarters);
  }

  return [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, quarters]) => ({ year, quarters: [...quarters].sort((a, b) => a - b) }));
};

/**
 * Latest year, then the latest quarter within that year.
 * Returns null when the table has no usable period.
 */
export const latestPeriod = (table: DataTable): Period | null => {
  const last = availablePeriods(table).at(-1);
  const quarter = last?.quarters.at(-1);
  if (last === undefined || quarter === undefined) return null;
  return { year: last.year, quarter };
};

export const selectPeriod = (table: DataTable, period: Period): DataTable =>
  filterEquals(table, { [YEAR_COLUMN]: period.year, [QUARTER_COLUMN]: period.quarter });

export const selectYear = (table: DataTable, year: number): DataTable =>
  filterEquals(table, { [YEAR_COLUMN]: year });
