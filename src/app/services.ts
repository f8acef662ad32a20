/**
 * Process-wide services shared by every route: the memoized table loader and
 * the geographic reference.
 */

import { createChildLogger } from '../infra/logger/index.js';
import { makeKyselyTableSource } from '../modules/datasets/shell/repo/kysely-table-source.js';
import { createTableLoader } from '../modules/datasets/shell/service/table-loader.js';
import { makeDbHealthChecker } from '../modules/health/shell/checkers/db-checker.js';
import { makeGeoReferenceHealthChecker } from '../modules/health/shell/checkers/geo-checker.js';
import { DEFAULT_ALIAS_TABLE } from '../modules/regions/core/aliases.js';
import { createGeoReferenceService } from '../modules/regions/shell/service/geo-reference-service.js';

import type { PaymentsDbClient } from '../infra/database/client.js';
import type { TableLoader, TableSource } from '../modules/datasets/core/ports.js';
import type { HealthChecker } from '../modules/health/core/ports.js';
import type { GeoReferenceRepo } from '../modules/regions/core/ports.js';
import type { RegionAliasTable } from '../modules/regions/core/types.js';
import type { GeoReferenceService } from '../modules/regions/shell/service/geo-reference-service.js';
import type { Logger } from 'pino';

export interface ServiceDeps {
  logger: Logger;
  geoRepo: GeoReferenceRepo;
  /** Payments database; also probed by the readiness check */
  db?: PaymentsDbClient;
  /** Overrides the Kysely source built from `db` */
  tableSource?: TableSource;
  aliases?: RegionAliasTable;
}

export interface AppServices {
  tableLoader: TableLoader;
  geoReference: GeoReferenceService;
  healthCheckers: HealthChecker[];
}

export const createServices = (deps: ServiceDeps): AppServices => {
  const { logger, geoRepo, db } = deps;
  const aliases = deps.aliases ?? DEFAULT_ALIAS_TABLE;

  const tableSource =
    deps.tableSource ?? (db !== undefined ? makeKyselyTableSource(db) : undefined);
  if (tableSource === undefined) {
    throw new Error('Missing required dependencies: db or tableSource');
  }

  const tableLoader = createTableLoader({
    source: tableSource,
    aliases,
    logger: createChildLogger(logger, { component: 'table-loader' }),
  });

  const geoReference = createGeoReferenceService({
    repo: geoRepo,
    aliases,
    logger: createChildLogger(logger, { component: 'geo-reference' }),
  });

  const healthCheckers: HealthChecker[] = [makeGeoReferenceHealthChecker(geoReference)];
  if (db !== undefined) {
    healthCheckers.unshift(makeDbHealthChecker(db, { name: 'database' }));
  }

  return { tableLoader, geoReference, healthCheckers };
};
