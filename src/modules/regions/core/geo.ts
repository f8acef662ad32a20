/**
 * Attaches canonical keys to the boundary dataset.
 */

import { normalizeRegionName } from './normalize.js';
import {
  CANONICAL_NAME_PROPERTY,
  GEO_NAME_PROPERTY,
  type CanonicalGeoReference,
  type GeoFeature,
  type GeoFeatureCollection,
  type RegionAliasTable,
} from './types.js';

/**
 * Returns a copy of `collection` where every feature has a properties object
 * carrying `State_Name`. Features whose name is missing or not a string get
 * '' and are left out of `keys`.
 */
export const canonicalizeGeoReference = (
  collection: GeoFeatureCollection,
  aliases?: RegionAliasTable
): CanonicalGeoReference => {
  const keys = new Set<string>();

  const features = collection.features.map((feature): GeoFeature => {
    const properties = feature.properties ?? {};
    const canonical = normalizeRegionName(properties[GEO_NAME_PROPERTY], 'geo', aliases);

    if (canonical !== '') {
      keys.add(canonical);
    }

    return {
      ...feature,
      properties: { ...properties, [CANONICAL_NAME_PROPERTY]: canonical },
    };
  });

  return {
    collection: { ...collection, features },
    keys,
  };
};
