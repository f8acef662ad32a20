/**
 * Regions REST Routes
 *
 * Endpoints:
 * - GET /api/v1/regions/geojson                - boundary dataset with canonical keys
 * - GET /api/v1/regions/unmatched/:datasetId   - dataset regions missing from the boundaries
 */

import {
  UnmatchedRegionsParamsSchema,
  UnmatchedRegionsResponseSchema,
  type UnmatchedRegionsParams,
} from './schemas.js';
import { findUnmatchedTableRegions } from '../../core/coverage.js';

import type { TableLoader } from '../../../datasets/core/ports.js';
import type { GeoReferenceService } from '../service/geo-reference-service.js';
import type { FastifyPluginAsync } from 'fastify';

export const GEO_UNAVAILABLE_NOTICE =
  'Geographic reference is unavailable; regions could not be checked.';

export interface MakeRegionRoutesDeps {
  geoReference: GeoReferenceService;
  tableLoader: TableLoader;
}

export const makeRegionRoutes = (deps: MakeRegionRoutesDeps): FastifyPluginAsync => {
  const { geoReference, tableLoader } = deps;

  return async (fastify) => {
    fastify.get('/api/v1/regions/geojson', async (_request, reply) => {
      const { collection } = await geoReference.get();
      return reply
        .status(200)
        .header('content-type', 'application/geo+json; charset=utf-8')
        .send(collection);
    });

    fastify.get<{ Params: UnmatchedRegionsParams }>(
      '/api/v1/regions/unmatched/:datasetId',
      {
        schema: {
          params: UnmatchedRegionsParamsSchema,
          response: {
            200: UnmatchedRegionsResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { datasetId } = request.params;
        const [reference, loaded] = await Promise.all([
          geoReference.get(),
          tableLoader.load(datasetId),
        ]);

        // Without boundaries every region would look unmatched
        if (reference.keys.size === 0) {
          return reply.status(200).send({
            ok: true,
            data: {
              datasetId,
              unmatched: [],
              unmappedRows: loaded.unmappedRows,
              notice: GEO_UNAVAILABLE_NOTICE,
            },
          });
        }

        const unmatched = findUnmatchedTableRegions(loaded.table, reference.keys);

        if (unmatched.length > 0) {
          request.log.warn({ datasetId, unmatched }, 'Dataset regions missing from geographic reference');
        }

        return reply.status(200).send({
          ok: true,
          data: {
            datasetId,
            unmatched,
            unmappedRows: loaded.unmappedRows,
            ...(loaded.notice !== undefined && { notice: loaded.notice }),
          },
        });
      }
    );
  };
};
