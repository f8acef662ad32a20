/**
 * Table Operations
 *
 * Pure group-by, ratio and top-N helpers over DataTable. Sums, means and
 * ratios go through Decimal so that aggregating many currency amounts does
 * not accumulate floating point drift.
 */

import { Decimal } from 'decimal.js';

import { toNumber, type CellValue, type DataTable, type Row } from '../../../common/types/table.js';

import type { AggregateOptions, RatioOptions, SortOrder, TopNOptions } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toDecimal = (value: CellValue | undefined): Decimal | null => {
  const numeric = toNumber(value);
  if (numeric === null) return null;

  // Keep the exact digits of numeric strings (PostgreSQL numeric)
  return typeof value === 'string' ? new Decimal(value.trim()) : new Decimal(numeric);
};

const isMissingKey = (value: CellValue | undefined): boolean =>
  value === undefined || value === null || value === '';

/**
 * Orders cells the way a dataframe sorts group keys: numbers numerically and
 * before strings, strings by code unit.
 */
export const compareCells = (a: CellValue | undefined, b: CellValue | undefined): number => {
  const left = typeof a === 'number' ? a : null;
  const right = typeof b === 'number' ? b : null;

  if (left !== null && right !== null) return left - right;
  if (left !== null) return -1;
  if (right !== null) return 1;

  const leftText = String(a ?? '');
  const rightText = String(b ?? '');
  if (leftText < rightText) return -1;
  if (leftText > rightText) return 1;
  return 0;
};

const appendColumn = (columns: readonly string[], column: string): string[] =>
  columns.includes(column) ? [...columns] : [...columns, column];

// ─────────────────────────────────────────────────────────────────────────────
// Filtering
// ─────────────────────────────────────────────────────────────────────────────

export const filterRows = (table: DataTable, predicate: (row: Row) => boolean): DataTable => ({
  columns: table.columns,
  rows: table.rows.filter(predicate),
});

/**
 * Keeps rows whose cells equal every criterion. Number criteria also match
 * numeric strings ("2023" equals 2023).
 */
export const filterEquals = (
  table: DataTable,
  criteria: Readonly<Record<string, CellValue>>
): DataTable => {
  const entries = Object.entries(criteria);

  return filterRows(table, (row) =>
    entries.every(([column, expected]) => {
      const actual = row[column];
      if (typeof expected === 'number') {
        return toNumber(actual) === expected;
      }
      return actual === expected;
    })
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation
// ─────────────────────────────────────────────────────────────────────────────

interface GroupAccumulator {
  keys: CellValue[];
  sums: Decimal[];
  counts: number[];
}

/**
 * One row per distinct combination of `groupBy` values, sorted ascending by
 * key. Rows with a null or empty key are left out (unmapped regions never
 * join). Non-numeric measure cells are ignored: a sum over none is 0, a mean
 * over none is null.
 */
export const aggregate = (table: DataTable, options: AggregateOptions): DataTable => {
  const { groupBy, measures } = options;
  const columns = [...groupBy, ...measures.map((m) => m.as ?? m.field)];
  const groups = new Map<string, GroupAccumulator>();

  for (const row of table.rows) {
    const keys = groupBy.map((column) => row[column] ?? null);
    if (keys.some(isMissingKey)) continue;

    const id = JSON.stringify(keys);
    const group = groups.get(id) ?? {
      keys,
      sums: measures.map(() => new Decimal(0)),
      counts: measures.map(() => 0),
    };
    groups.set(id, group);

    measures.forEach((measure, i) => {
      const value = toDecimal(row[measure.field]);
      if (value === null) return;
      group.sums[i] = (group.sums[i] ?? new Decimal(0)).plus(value);
      group.counts[i] = (group.counts[i] ?? 0) + 1;
    });
  }

  const ordered = [...groups.values()].sort((a, b) => {
    for (let i = 0; i < groupBy.length; i++) {
      const diff = compareCells(a.keys[i], b.keys[i]);
      if (diff !== 0) return diff;
    }
    return 0;
  });

  const rows = ordered.map((group): Row => {
    const row: Record<string, CellValue> = {};

    groupBy.forEach((column, i) => {
      row[column] = group.keys[i] ?? null;
    });

    measures.forEach((measure, i) => {
      const sum = group.sums[i] ?? new Decimal(0);
      const count = group.counts[i] ?? 0;
      const column = measure.as ?? measure.field;

      switch (measure.fn) {
        case 'sum':
          row[column] = sum.toNumber();
          break;
        case 'mean':
          row[column] = count > 0 ? sum.div(count).toNumber() : null;
          break;
        case 'count':
          row[column] = count;
          break;
      }
    });

    return row;
  });

  return { columns, rows };
};

// ─────────────────────────────────────────────────────────────────────────────
// Derived columns
// ─────────────────────────────────────────────────────────────────────────────

export const deriveColumn = (
  table: DataTable,
  as: string,
  derive: (row: Row) => CellValue
): DataTable => ({
  columns: appendColumn(table.columns, as),
  rows: table.rows.map((row) => ({ ...row, [as]: derive(row) })),
});

/**
 * `as = source / divisor`, e.g. amounts in millions. Non-numeric cells become null.
 */
export const scaleColumn = (
  table: DataTable,
  source: string,
  as: string,
  divisor: number
): DataTable =>
  deriveColumn(table, as, (row) => {
    const value = toDecimal(row[source]);
    return value === null ? null : value.div(divisor).toNumber();
  });

/**
 * Adds `numerator / denominator` without ever dividing by zero; see RatioGuard.
 * A missing numerator yields null.
 */
export const withRatio = (table: DataTable, options: RatioOptions): DataTable => {
  const { numerator, denominator, as, guard } = options;
  const rows: Row[] = [];

  for (const row of table.rows) {
    const num = toDecimal(row[numerator]);
    const den = toDecimal(row[denominator]) ?? new Decimal(0);

    if (guard === 'skip' && den.isZero()) continue;

    let value: CellValue;
    if (num === null) {
      value = null;
    } else {
      const divisor = guard === 'add-one' ? den.plus(1) : den;
      value = divisor.isZero() ? 0 : num.div(divisor).toNumber();
    }

    rows.push({ ...row, [as]: value });
  }

  return { columns: appendColumn(table.columns, as), rows };
};

// ─────────────────────────────────────────────────────────────────────────────
// Selection
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The `n` rows with the largest (or smallest) `by`, ties in original order.
 * Rows without a numeric `by` rank last. `n` larger than the table returns
 * every row, sorted.
 */
export const topN = (table: DataTable, options: TopNOptions): DataTable => {
  const { by, n } = options;
  const order: SortOrder = options.order ?? 'desc';
  const direction = order === 'desc' ? -1 : 1;

  const ranked = table.rows
    .map((row) => ({ row, value: toNumber(row[by]) }))
    .sort((a, b) => {
      if (a.value === null && b.value === null) return 0;
      if (a.value === null) return 1;
      if (b.value === null) return -1;
      return (a.value - b.value) * direction;
    });

  return {
    columns: table.columns,
    rows: ranked.slice(0, Math.max(0, Math.floor(n))).map(({ row }) => row),
  };
};

/**
 * Sum of the numeric cells of a column; 0 for an empty table.
 */
export const sumColumn = (table: DataTable, column: string): number =>
  table.rows
    .reduce((total, row) => total.plus(toDecimal(row[column]) ?? 0), new Decimal(0))
    .toNumber();

/**
 * Distinct non-empty values of a column, sorted ascending.
 */
export const distinctValues = (table: DataTable, column: string): CellValue[] => {
  const seen = new Map<string, CellValue>();

  for (const row of table.rows) {
    const value = row[column];
    if (value === undefined || isMissingKey(value)) continue;
    seen.set(JSON.stringify(value), value);
  }

  return [...seen.values()].sort(compareCells);
};
