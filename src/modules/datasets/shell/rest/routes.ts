/**
 * Datasets REST Routes
 *
 * GET /api/v1/datasets - availability and shape of every dataset
 */

import { Type } from '@sinclair/typebox';

import {
  DatasetSummarySchema,
  isDatasetId,
  type DatasetSummary,
  type LoadedTable,
} from '../../core/types.js';

import type { TableLoader } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeDatasetRoutesDeps {
  tableLoader: TableLoader;
}

const ListDatasetsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(DatasetSummarySchema),
});

const toSummary = (loaded: LoadedTable): DatasetSummary[] => {
  if (!isDatasetId(loaded.datasetId)) return [];

  return [
    {
      id: loaded.datasetId,
      available: loaded.notice === undefined,
      rowCount: loaded.table.rows.length,
      columns: [...loaded.table.columns],
      unmappedRows: loaded.unmappedRows,
      ...(loaded.notice !== undefined && { notice: loaded.notice }),
    },
  ];
};

export const makeDatasetRoutes = (deps: MakeDatasetRoutesDeps): FastifyPluginAsync => {
  const { tableLoader } = deps;

  return async (fastify) => {
    fastify.get(
      '/api/v1/datasets',
      {
        schema: {
          response: {
            200: ListDatasetsResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const loaded = await tableLoader.loadAll();

        return reply.status(200).send({
          ok: true,
          data: loaded.flatMap(toSummary),
        });
      }
    );
  };
};
