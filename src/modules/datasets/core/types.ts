import { Type, type Static } from '@sinclair/typebox';

import type { DataTable } from '../../../common/types/table.js';

/**
 * Every dataset the server can load. The id doubles as the table name.
 */
export const DatasetIdSchema = Type.Union([
  Type.Literal('aggregated_transaction'),
  Type.Literal('aggregated_insurance'),
  Type.Literal('aggregated_user'),
  Type.Literal('map_transaction'),
  Type.Literal('map_insurance'),
  Type.Literal('map_user'),
  Type.Literal('top_transaction'),
  Type.Literal('top_insurance'),
  Type.Literal('top_user'),
]);

export type DatasetId = Static<typeof DatasetIdSchema>;

export const DATASET_IDS: readonly DatasetId[] = [
  'aggregated_transaction',
  'aggregated_insurance',
  'aggregated_user',
  'map_transaction',
  'map_insurance',
  'map_user',
  'top_transaction',
  'top_insurance',
  'top_user',
];

export const isDatasetId = (value: string): value is DatasetId =>
  DATASET_IDS.some((id) => id === value);

/** Region column as stored in the database */
export const SOURCE_REGION_COLUMN = 'States';

/** Region column after normalization; matches the boundary dataset's canonical keys */
export const REGION_COLUMN = 'State';

/**
 * A row exactly as the data source returned it.
 */
export type RawRow = Readonly<Record<string, unknown>>;

/**
 * Result of loading a dataset. Loading never fails: when the source is
 * unavailable the table is empty and `notice` says why.
 */
export interface LoadedTable {
  datasetId: string;
  table: DataTable;
  /** Rows whose region name was missing or not a string */
  unmappedRows: number;
  notice?: string;
}

/**
 * Listing entry for GET /api/v1/datasets.
 */
export const DatasetSummarySchema = Type.Object({
  id: DatasetIdSchema,
  available: Type.Boolean(),
  rowCount: Type.Number(),
  columns: Type.Array(Type.String()),
  unmappedRows: Type.Number(),
  notice: Type.Optional(Type.String()),
});

export type DatasetSummary = Static<typeof DatasetSummarySchema>;
