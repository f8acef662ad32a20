import { describe, it, expect } from 'vitest';

import {
  DEFAULT_ALIAS_TABLE,
  createGeoReferenceService,
  reportRegionCoverage,
} from '@/modules/regions/index.js';
import { createTableLoader } from '@/modules/datasets/index.js';

import { makeFeatureCollection, makeTransactionRow } from '../../fixtures/builders.js';
import { makeFakeGeoRepo, makeFakeTableSource, makeSilentLogger } from '../../fixtures/fakes.js';

describe('createGeoReferenceService', () => {
  it('loads and canonicalizes the collection once', async () => {
    const repo = makeFakeGeoRepo(makeFeatureCollection(['Orissa', 'Goa']));
    const service = createGeoReferenceService({
      repo,
      aliases: DEFAULT_ALIAS_TABLE,
      logger: makeSilentLogger(),
    });

    const first = await service.get();
    const second = await service.get();

    expect(repo.loadCount()).toBe(1);
    expect(second).toBe(first);
    expect([...first.keys]).toEqual(['odisha', 'goa']);
  });

  it('shares one load between concurrent callers', async () => {
    const repo = makeFakeGeoRepo(makeFeatureCollection(['Goa']));
    const service = createGeoReferenceService({
      repo,
      aliases: DEFAULT_ALIAS_TABLE,
      logger: makeSilentLogger(),
    });

    await Promise.all([service.get(), service.get(), service.get()]);

    expect(repo.loadCount()).toBe(1);
  });

  it('degrades to an empty collection and retries on the next call', async () => {
    const repo = makeFakeGeoRepo({ type: 'NotFound', message: 'File not found at /missing' });
    const service = createGeoReferenceService({
      repo,
      aliases: DEFAULT_ALIAS_TABLE,
      logger: makeSilentLogger(),
    });

    const reference = await service.get();
    await service.get();

    expect(reference.collection).toEqual({ type: 'FeatureCollection', features: [] });
    expect(reference.keys.size).toBe(0);
    expect(repo.loadCount()).toBe(2);
  });
});

describe('reportRegionCoverage', () => {
  const logger = makeSilentLogger();

  it('lists unmatched regions per dataset', async () => {
    const source = makeFakeTableSource({
      aggregated_transaction: [
        makeTransactionRow({
          States: 'Orissa',
          Years: 2023,
          Quarter: 1,
          Transaction_count: 1,
          Transaction_amount: 10,
        }),
        makeTransactionRow({
          States: 'Ladakh',
          Years: 2023,
          Quarter: 1,
          Transaction_count: 1,
          Transaction_amount: 10,
        }),
      ],
    });
    const tableLoader = createTableLoader({ source, aliases: DEFAULT_ALIAS_TABLE, logger });
    const geoReference = createGeoReferenceService({
      repo: makeFakeGeoRepo(makeFeatureCollection(['Odisha'])),
      aliases: DEFAULT_ALIAS_TABLE,
      logger,
    });

    const coverage = await reportRegionCoverage({ tableLoader, geoReference, logger });

    expect(coverage['aggregated_transaction']).toEqual(['ladakh']);
    expect(coverage['map_user']).toEqual([]);
    expect(Object.keys(coverage)).toHaveLength(9);
  });

  it('skips the check when the reference is empty', async () => {
    const tableLoader = createTableLoader({
      source: makeFakeTableSource(),
      aliases: DEFAULT_ALIAS_TABLE,
      logger,
    });
    const geoReference = createGeoReferenceService({
      repo: makeFakeGeoRepo(makeFeatureCollection([])),
      aliases: DEFAULT_ALIAS_TABLE,
      logger,
    });

    expect(await reportRegionCoverage({ tableLoader, geoReference, logger })).toEqual({});
  });
});
