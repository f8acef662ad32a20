/**
 * In-memory tabular data shared by the loader, the aggregator and the chart builders.
 */

/**
 * A single cell. PostgreSQL `numeric` and `bigint` values arrive as strings;
 * the aggregator coerces them when it needs numbers.
 */
export type CellValue = string | number | boolean | null;

export type Row = Readonly<Record<string, CellValue>>;

export interface DataTable {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/** Zero rows and zero columns: the "no data" table */
export const EMPTY_TABLE: DataTable = { columns: [], rows: [] };

export const isEmptyTable = (table: DataTable): boolean => table.rows.length === 0;

export const hasColumn = (table: DataTable, column: string): boolean =>
  table.columns.includes(column);

/**
 * Reads a cell as a finite number. Numeric strings are accepted; anything
 * else (null, booleans, blank or non-numeric strings) yields null.
 */
export const toNumber = (value: CellValue | undefined): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};
