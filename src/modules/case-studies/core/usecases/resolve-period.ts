import { availablePeriods } from '../../../analytics/core/periods.js';

import type { Period } from '../../../../common/types/period.js';
import type { DataTable } from '../../../../common/types/table.js';
import type { PeriodSelection } from '../types.js';

/**
 * Fills in the missing half of a period selection from the table: the latest
 * year, then the latest quarter within the chosen year.
 *
 * Returns null when nothing can be selected (empty table, or a requested
 * year without any quarters and no explicit quarter).
 */
export const resolvePeriod = (table: DataTable, selection: PeriodSelection): Period | null => {
  const periods = availablePeriods(table);

  const year = selection.year ?? periods.at(-1)?.year;
  if (year === undefined) return null;

  const quarter = selection.quarter ?? periods.find((p) => p.year === year)?.quarters.at(-1);
  if (quarter === undefined) return null;

  return { year, quarter };
};
