import type { RegionsError } from './errors.js';
import type { GeoFeatureCollection, RegionAliasFile } from './types.js';
import type { Result } from 'neverthrow';

export interface GeoReferenceRepo {
  /**
   * Read the raw boundary collection. Canonical keys are attached by the caller.
   */
  load(): Promise<Result<GeoFeatureCollection, RegionsError>>;
}

export interface RegionAliasSource {
  /**
   * Read alias overrides to merge over the built-in table.
   */
  load(): Promise<Result<RegionAliasFile, RegionsError>>;
}
