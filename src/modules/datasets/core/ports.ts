import type { DatasetError } from './errors.js';
import type { DatasetId, LoadedTable, RawRow } from './types.js';
import type { Result } from 'neverthrow';

/**
 * The relational store, reduced to "fetch all rows of table X".
 */
export interface TableSource {
  fetchAll(datasetId: DatasetId): Promise<Result<RawRow[], DatasetError>>;
}

/**
 * Normalized, memoized access to datasets.
 */
export interface TableLoader {
  /**
   * Load one dataset. Unknown ids and source failures come back as an empty
   * table with a notice rather than an error.
   */
  load(datasetId: string): Promise<LoadedTable>;

  /**
   * Load every known dataset.
   */
  loadAll(): Promise<LoadedTable[]>;
}
