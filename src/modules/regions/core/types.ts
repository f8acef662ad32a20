/**
 * Regions Module - Core Types
 *
 * Canonical region keys join payment tables to the boundary dataset.
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Where a region name comes from. Tables get the extra multi-word aliases,
 * the boundary dataset only the historical renames.
 */
export type RegionSource = 'geo' | 'table';

/** Feature property holding the region name in the boundary dataset */
export const GEO_NAME_PROPERTY = 'NAME_1';

/** Feature property the canonical key is written to */
export const CANONICAL_NAME_PROPERTY = 'State_Name';

/** GeoJSON feature id key for charts that look features up by canonical name */
export const CANONICAL_FEATURE_ID_KEY = `properties.${CANONICAL_NAME_PROPERTY}`;

/**
 * Resolved alias lookups, one per source. Every value is already a fixed
 * point, so resolving a name twice gives the same key as resolving it once.
 */
export interface RegionAliasTable {
  /** Historical renames only */
  readonly geo: ReadonlyMap<string, string>;
  /** Historical renames plus the multi-word table spellings */
  readonly table: ReadonlyMap<string, string>;
}

/**
 * Shape of the optional YAML file that extends the built-in aliases.
 *
 * ```yaml
 * historical:
 *   uttaranchal: uttarakhand
 * tabular:
 *   jammu and kashmir: jammu & kashmir
 * ```
 */
export const RegionAliasFileSchema = Type.Object(
  {
    historical: Type.Optional(Type.Record(Type.String(), Type.String())),
    tabular: Type.Optional(Type.Record(Type.String(), Type.String())),
  },
  { additionalProperties: false }
);

export type RegionAliasFile = Static<typeof RegionAliasFileSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// GeoJSON
// ─────────────────────────────────────────────────────────────────────────────

const GeometrySchema = Type.Union([
  Type.Object({ type: Type.String() }, { additionalProperties: true }),
  Type.Null(),
]);

export const GeoFeatureSchema = Type.Object(
  {
    type: Type.Literal('Feature'),
    properties: Type.Optional(Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()])),
    geometry: GeometrySchema,
  },
  { additionalProperties: true }
);

export const GeoFeatureCollectionSchema = Type.Object(
  {
    type: Type.Literal('FeatureCollection'),
    features: Type.Array(GeoFeatureSchema),
  },
  { additionalProperties: true }
);

export type GeoFeature = Static<typeof GeoFeatureSchema>;
export type GeoFeatureCollection = Static<typeof GeoFeatureCollectionSchema>;

/**
 * Boundary dataset with canonical keys attached to every feature.
 */
export interface CanonicalGeoReference {
  collection: GeoFeatureCollection;
  /** Non-empty canonical keys present in the collection */
  keys: ReadonlySet<string>;
}

export const EMPTY_FEATURE_COLLECTION: GeoFeatureCollection = {
  type: 'FeatureCollection',
  features: [],
};
