/**
 * Regions Module Public API
 *
 * Canonical region keys, the alias table and the geographic reference.
 */

// ============================================================================
// Core
// ============================================================================

export {
  CANONICAL_FEATURE_ID_KEY,
  CANONICAL_NAME_PROPERTY,
  EMPTY_FEATURE_COLLECTION,
  GEO_NAME_PROPERTY,
  GeoFeatureCollectionSchema,
  RegionAliasFileSchema,
  type CanonicalGeoReference,
  type GeoFeature,
  type GeoFeatureCollection,
  type RegionAliasFile,
  type RegionAliasTable,
  type RegionSource,
} from './core/types.js';

export type { RegionsError } from './core/errors.js';
export type { GeoReferenceRepo, RegionAliasSource } from './core/ports.js';

export {
  DEFAULT_ALIAS_TABLE,
  DEFAULT_HISTORICAL_ALIASES,
  DEFAULT_TABULAR_ALIASES,
  createAliasTable,
} from './core/aliases.js';
export { normalizeRegionName, findUnmatchedRegions } from './core/normalize.js';
export { canonicalizeGeoReference } from './core/geo.js';
export { findUnmatchedTableRegions } from './core/coverage.js';
export { loadRegionAliases, type LoadRegionAliasesDeps } from './core/usecases/load-region-aliases.js';

// ============================================================================
// Shell
// ============================================================================

export {
  createFileGeoReferenceRepo,
  type FileGeoReferenceRepoOptions,
} from './shell/repo/fs-geo-repo.js';
export {
  createYamlRegionAliasSource,
  type YamlRegionAliasSourceOptions,
} from './shell/repo/yaml-alias-source.js';
export {
  createGeoReferenceService,
  type GeoReferenceService,
  type GeoReferenceServiceDeps,
} from './shell/service/geo-reference-service.js';
export {
  reportRegionCoverage,
  type RegionCoverage,
  type RegionCoverageDeps,
} from './shell/service/region-coverage.js';
export { makeRegionRoutes, type MakeRegionRoutesDeps } from './shell/rest/routes.js';
