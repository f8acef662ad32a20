/**
 * Region coverage report
 *
 * Compares every dataset's regions with the geographic reference and logs the
 * keys that would render unfilled on a map, usually a missing alias.
 */

import { findUnmatchedTableRegions } from '../../core/coverage.js';

import type { TableLoader } from '../../../datasets/core/ports.js';
import type { GeoReferenceService } from './geo-reference-service.js';
import type { Logger } from 'pino';

export interface RegionCoverageDeps {
  tableLoader: TableLoader;
  geoReference: GeoReferenceService;
  logger: Logger;
}

export type RegionCoverage = Record<string, string[]>;

export async function reportRegionCoverage(deps: RegionCoverageDeps): Promise<RegionCoverage> {
  const { tableLoader, geoReference, logger } = deps;
  const [reference, datasets] = await Promise.all([geoReference.get(), tableLoader.loadAll()]);
  const coverage: RegionCoverage = {};

  if (reference.keys.size === 0) {
    logger.warn('Geographic reference is empty; skipping region coverage check');
    return coverage;
  }

  for (const { datasetId, table } of datasets) {
    const unmatched = findUnmatchedTableRegions(table, reference.keys);
    coverage[datasetId] = unmatched;

    if (unmatched.length > 0) {
      logger.warn({ datasetId, unmatched }, 'Dataset regions missing from geographic reference');
    }
  }

  return coverage;
}
