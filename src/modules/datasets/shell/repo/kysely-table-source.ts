/**
 * Kysely-backed table source.
 *
 * Issues `SELECT * FROM <table>` for whitelisted dataset ids only; the table
 * identifier is quoted by Kysely, never interpolated.
 */

import { sql } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { createDatabaseError, type DatasetError } from '../../core/errors.js';

import type { TableSource } from '../../core/ports.js';
import type { DatasetId, RawRow } from '../../core/types.js';
import type { PaymentsDbClient, PaymentsTableName } from '../../../../infra/database/client.js';

const DATASET_TABLES: Record<DatasetId, PaymentsTableName> = {
  aggregated_transaction: 'aggregated_transaction',
  aggregated_insurance: 'aggregated_insurance',
  aggregated_user: 'aggregated_user',
  map_transaction: 'map_transaction',
  map_insurance: 'map_insurance',
  map_user: 'map_user',
  top_transaction: 'top_transaction',
  top_insurance: 'top_insurance',
  top_user: 'top_user',
};

export class KyselyTableSource implements TableSource {
  constructor(private readonly db: PaymentsDbClient) {}

  async fetchAll(datasetId: DatasetId): Promise<Result<RawRow[], DatasetError>> {
    const table = DATASET_TABLES[datasetId];

    try {
      const result = await sql<RawRow>`SELECT * FROM ${sql.table(table)}`.execute(this.db);
      return ok(result.rows);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown database error';
      return err(createDatabaseError(message));
    }
  }
}

export const makeKyselyTableSource = (db: PaymentsDbClient): TableSource => {
  return new KyselyTableSource(db);
};
