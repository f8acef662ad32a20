/**
 * Datasets Module - Domain Errors
 */

export interface UnknownDatasetError {
  readonly type: 'UNKNOWN_DATASET';
  readonly datasetId: string;
  readonly message: string;
}

export interface DatabaseError {
  readonly type: 'DATABASE_ERROR';
  readonly cause: string;
}

export type DatasetError = UnknownDatasetError | DatabaseError;

export const createUnknownDatasetError = (datasetId: string): UnknownDatasetError => ({
  type: 'UNKNOWN_DATASET',
  datasetId,
  message: `Unknown dataset '${datasetId}'`,
});

export const createDatabaseError = (cause: string): DatabaseError => ({
  type: 'DATABASE_ERROR',
  cause,
});

export const describeDatasetError = (error: DatasetError): string =>
  error.type === 'UNKNOWN_DATASET' ? error.message : `Database error: ${error.cause}`;
