import { describe, it, expect } from 'vitest';

import { canonicalizeGeoReference, type GeoFeatureCollection } from '@/modules/regions/index.js';

import { makeFeatureCollection } from '../../fixtures/builders.js';

describe('canonicalizeGeoReference', () => {
  it('writes the canonical key to State_Name', () => {
    const { collection, keys } = canonicalizeGeoReference(
      makeFeatureCollection(['Maharashtra', 'Orissa'])
    );

    expect(collection.features.map((f) => f.properties?.['State_Name'])).toEqual([
      'maharashtra',
      'odisha',
    ]);
    expect(collection.features[1]?.properties?.['NAME_1']).toBe('Orissa');
    expect([...keys]).toEqual(['maharashtra', 'odisha']);
  });

  it('does not use table-only spellings', () => {
    const { keys } = canonicalizeGeoReference(makeFeatureCollection(['Andaman and Nicobar']));

    expect([...keys]).toEqual(['andaman and nicobar']);
  });

  it('creates properties for features without them and leaves them out of keys', () => {
    const input: GeoFeatureCollection = {
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: null, geometry: null }],
    };

    const { collection, keys } = canonicalizeGeoReference(input);

    expect(collection.features[0]?.properties).toEqual({ State_Name: '' });
    expect(keys.size).toBe(0);
  });

  it('does not mutate the input collection', () => {
    const input = makeFeatureCollection(['Orissa']);

    canonicalizeGeoReference(input);

    expect(input.features[0]?.properties).toEqual({ NAME_1: 'Orissa' });
  });
});
