/**
 * Table Loader
 *
 * Memoizes normalized datasets for the lifetime of the process. Concurrent
 * first requests for a dataset share one query. Failed loads return an empty
 * table with a notice and are not memoized.
 */

import { createMemoCache } from '../../../../infra/cache/index.js';
import { EMPTY_TABLE } from '../../../../common/types/table.js';
import { describeDatasetError } from '../../core/errors.js';
import { loadDataset } from '../../core/usecases/load-dataset.js';
import { DATASET_IDS, type LoadedTable } from '../../core/types.js';

import type { TableLoader, TableSource } from '../../core/ports.js';
import type { RegionAliasTable } from '../../../regions/core/types.js';
import type { Logger } from 'pino';

export interface TableLoaderDeps {
  source: TableSource;
  aliases: RegionAliasTable;
  logger: Logger;
}

export const createTableLoader = (deps: TableLoaderDeps): TableLoader => {
  const { source, aliases, logger } = deps;
  const tables = createMemoCache<string, LoadedTable>({
    shouldKeep: (loaded) => loaded.notice === undefined,
  });

  const fetchTable = async (datasetId: string): Promise<LoadedTable> => {
    const result = await loadDataset({ source, aliases }, datasetId);

    if (result.isErr()) {
      logger.warn({ datasetId, err: result.error }, 'Failed to load dataset');
      return {
        datasetId,
        table: EMPTY_TABLE,
        unmappedRows: 0,
        notice: `Data for '${datasetId}' is unavailable. ${describeDatasetError(result.error)}`,
      };
    }

    const { table, unmappedRows } = result.value;
    if (unmappedRows > 0) {
      logger.warn({ datasetId, unmappedRows }, 'Rows with a missing region name were left unmapped');
    }
    logger.debug({ datasetId, rows: table.rows.length }, 'Dataset loaded');

    return { datasetId, table, unmappedRows };
  };

  const loader: TableLoader = {
    load(datasetId) {
      return tables.get(datasetId, () => fetchTable(datasetId));
    },

    loadAll() {
      return Promise.all(DATASET_IDS.map((id) => loader.load(id)));
    },
  };

  return loader;
};
