import { describe, it, expect } from 'vitest';

import { createTableLoader, DATASET_IDS } from '@/modules/datasets/index.js';
import { DEFAULT_ALIAS_TABLE } from '@/modules/regions/index.js';

import { makeTransactionRow } from '../../fixtures/builders.js';
import { makeFakeTableSource, makeSilentLogger, type FakeTableSource } from '../../fixtures/fakes.js';

const rows = [
  makeTransactionRow({
    States: 'Orissa',
    Years: 2023,
    Quarter: 2,
    Transaction_count: 5,
    Transaction_amount: 50,
  }),
];

const makeLoader = (source: FakeTableSource) =>
  createTableLoader({ source, aliases: DEFAULT_ALIAS_TABLE, logger: makeSilentLogger() });

describe('createTableLoader', () => {
  it('returns the normalized table', async () => {
    const loader = makeLoader(makeFakeTableSource({ aggregated_transaction: rows }));

    const loaded = await loader.load('aggregated_transaction');

    expect(loaded.datasetId).toBe('aggregated_transaction');
    expect(loaded.notice).toBeUndefined();
    expect(loaded.unmappedRows).toBe(0);
    expect(loaded.table.rows).toEqual([
      {
        Transaction_type: 'Peer-to-peer payments',
        State: 'odisha',
        Years: 2023,
        Quarter: 2,
        Transaction_count: 5,
        Transaction_amount: 50,
      },
    ]);
  });

  it('memoizes successful loads', async () => {
    const source = makeFakeTableSource({ aggregated_transaction: rows });
    const loader = makeLoader(source);

    const first = await loader.load('aggregated_transaction');
    source.setRows('aggregated_transaction', []);
    const second = await loader.load('aggregated_transaction');

    expect(second).toBe(first);
    expect(source.calls.get('aggregated_transaction')).toBe(1);
  });

  it('runs one query for concurrent first access', async () => {
    const source = makeFakeTableSource({ aggregated_transaction: rows }, { delayMs: 20 });
    const loader = makeLoader(source);

    const results = await Promise.all([
      loader.load('aggregated_transaction'),
      loader.load('aggregated_transaction'),
      loader.load('aggregated_transaction'),
    ]);

    expect(source.calls.get('aggregated_transaction')).toBe(1);
    expect(results[1]).toBe(results[0]);
    expect(results[2]).toBe(results[0]);
  });

  it('degrades to an empty table with a notice when the source fails', async () => {
    const source = makeFakeTableSource({}, { failing: ['map_user'] });
    const loader = makeLoader(source);

    const loaded = await loader.load('map_user');

    expect(loaded.table).toEqual({ columns: [], rows: [] });
    expect(loaded.notice).toBe(
      "Data for 'map_user' is unavailable. Database error: connection refused"
    );
  });

  it('does not memoize failures', async () => {
    const source = makeFakeTableSource({ map_user: [{ States: 'Goa', AppOpens: 3 }] }, { failing: ['map_user'] });
    const loader = makeLoader(source);

    const failed = await loader.load('map_user');
    source.setFailing('map_user', false);
    const recovered = await loader.load('map_user');

    expect(failed.notice).toBeDefined();
    expect(recovered.notice).toBeUndefined();
    expect(recovered.table.rows).toEqual([{ State: 'goa', AppOpens: 3 }]);
    expect(source.calls.get('map_user')).toBe(2);
  });

  it('returns a notice for unknown dataset ids without querying', async () => {
    const source = makeFakeTableSource();
    const loader = makeLoader(source);

    const loaded = await loader.load('payments');

    expect(loaded.notice).toBe("Data for 'payments' is unavailable. Unknown dataset 'payments'");
    expect(source.calls.size).toBe(0);
  });

  it('loads every dataset', async () => {
    const source = makeFakeTableSource({ aggregated_transaction: rows });
    const loader = makeLoader(source);

    const all = await loader.loadAll();

    expect(all.map((loaded) => loaded.datasetId)).toEqual([...DATASET_IDS]);
    expect(all.find((l) => l.datasetId === 'aggregated_transaction')?.table.rows).toHaveLength(1);
  });
});
