import { REGION_COLUMN } from '../../datasets/core/types.js';

import { findUnmatchedRegions } from './normalize.js';

import type { DataTable } from '../../../common/types/table.js';

/**
 * Canonical region keys of a normalized table that the geo reference lacks.
 */
export const findUnmatchedTableRegions = (
  table: DataTable,
  reference: ReadonlySet<string>
): string[] => {
  const keys: string[] = [];

  for (const row of table.rows) {
    const key = row[REGION_COLUMN];
    if (typeof key === 'string') keys.push(key);
  }

  return findUnmatchedRegions(keys, reference);
};
