// Types
export {
  DATASET_IDS,
  DatasetIdSchema,
  REGION_COLUMN,
  SOURCE_REGION_COLUMN,
  isDatasetId,
  type DatasetId,
  type DatasetSummary,
  type LoadedTable,
  type RawRow,
} from './core/types.js';

// Errors
export {
  createDatabaseError,
  createUnknownDatasetError,
  describeDatasetError,
  type DatasetError,
} from './core/errors.js';

// Ports
export type { TableLoader, TableSource } from './core/ports.js';

// Use cases
export { loadDataset, type LoadDatasetDeps } from './core/usecases/load-dataset.js';
export { normalizeTable, toCellValue, type NormalizedTable } from './core/usecases/normalize-table.js';

// Shell
export { makeKyselyTableSource, KyselyTableSource } from './shell/repo/kysely-table-source.js';
export { createTableLoader, type TableLoaderDeps } from './shell/service/table-loader.js';
export { makeDatasetRoutes, type MakeDatasetRoutesDeps } from './shell/rest/routes.js';
