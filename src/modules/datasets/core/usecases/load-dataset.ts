import { err, ok, type Result } from 'neverthrow';

import { normalizeTable, type NormalizedTable } from './normalize-table.js';
import { createUnknownDatasetError, type DatasetError } from '../errors.js';
import { isDatasetId } from '../types.js';

import type { RegionAliasTable } from '../../../regions/core/types.js';
import type { TableSource } from '../ports.js';

export interface LoadDatasetDeps {
  source: TableSource;
  aliases: RegionAliasTable;
}

/**
 * Fetches every row of a dataset and normalizes its region column.
 */
export async function loadDataset(
  deps: LoadDatasetDeps,
  datasetId: string
): Promise<Result<NormalizedTable, DatasetError>> {
  if (!isDatasetId(datasetId)) {
    return err(createUnknownDatasetError(datasetId));
  }

  const rows = await deps.source.fetchAll(datasetId);
  if (rows.isErr()) {
    return err(rows.error);
  }

  return ok(normalizeTable(rows.value, deps.aliases));
}
