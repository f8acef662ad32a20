/**
 * Geo Reference Service
 *
 * Loads the boundary dataset once per process and hands out the canonical
 * version. A failed load degrades to an empty collection (every region then
 * renders unfilled) and is retried on the next call.
 */

import { once } from '../../../../infra/cache/index.js';
import { canonicalizeGeoReference } from '../../core/geo.js';
import { EMPTY_FEATURE_COLLECTION, type CanonicalGeoReference } from '../../core/types.js';

import type { GeoReferenceRepo } from '../../core/ports.js';
import type { RegionAliasTable } from '../../core/types.js';
import type { Logger } from 'pino';

export interface GeoReferenceService {
  get(): Promise<CanonicalGeoReference>;
}

export interface GeoReferenceServiceDeps {
  repo: GeoReferenceRepo;
  aliases: RegionAliasTable;
  logger: Logger;
}

interface GeoLoad {
  reference: CanonicalGeoReference;
  loaded: boolean;
}

export const createGeoReferenceService = (deps: GeoReferenceServiceDeps): GeoReferenceService => {
  const { repo, aliases, logger } = deps;

  const load = once(
    async (): Promise<GeoLoad> => {
      const result = await repo.load();

      if (result.isErr()) {
        logger.error({ err: result.error }, 'Failed to load geographic reference');
        return {
          reference: { collection: EMPTY_FEATURE_COLLECTION, keys: new Set() },
          loaded: false,
        };
      }

      const reference = canonicalizeGeoReference(result.value, aliases);
      logger.info(
        { features: reference.collection.features.length, regions: reference.keys.size },
        'Geographic reference loaded'
      );

      return { reference, loaded: true };
    },
    { shouldKeep: (geo) => geo.loaded }
  );

  return {
    async get() {
      const { reference } = await load();
      return reference;
    },
  };
};
