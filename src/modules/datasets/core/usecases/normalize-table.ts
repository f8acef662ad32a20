/**
 * Turns raw source rows into a DataTable with a canonical region column.
 */

import { normalizeRegionName } from '../../../regions/core/normalize.js';
import { REGION_COLUMN, SOURCE_REGION_COLUMN, type RawRow } from '../types.js';

import type { CellValue, DataTable, Row } from '../../../../common/types/table.js';
import type { RegionAliasTable } from '../../../regions/core/types.js';

export interface NormalizedTable {
  table: DataTable;
  unmappedRows: number;
}

/**
 * Maps a driver value onto a cell. Dates become ISO strings; bigints stay
 * exact as strings when they do not fit a double.
 */
export const toCellValue = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value) ?? null;
};

/**
 * Column order follows the first row, with columns that only appear later appended.
 */
const collectColumns = (rows: readonly RawRow[]): string[] => {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
};

/**
 * Normalizes the `States` column (tabular alias path) and renames it to
 * `State`. Tables without a `States` column only get their cells coerced.
 */
export const normalizeTable = (
  rows: readonly RawRow[],
  aliases?: RegionAliasTable
): NormalizedTable => {
  const sourceColumns = collectColumns(rows);
  const hasRegion = sourceColumns.includes(SOURCE_REGION_COLUMN);
  let unmappedRows = 0;

  const columns = sourceColumns.map((column) =>
    hasRegion && column === SOURCE_REGION_COLUMN ? REGION_COLUMN : column
  );

  const normalizedRows = rows.map((raw): Row => {
    const row: Record<string, CellValue> = {};

    for (const column of sourceColumns) {
      const value = raw[column];

      if (hasRegion && column === SOURCE_REGION_COLUMN) {
        const canonical = normalizeRegionName(value, 'table', aliases);
        if (canonical === '') unmappedRows++;
        row[REGION_COLUMN] = canonical;
      } else {
        row[column] = toCellValue(value);
      }
    }

    return row;
  });

  return {
    table: { columns, rows: normalizedRows },
    unmappedRows,
  };
};
