import { describe, it, expect } from 'vitest';

import { createAliasTable, normalizeRegionName } from '@/modules/regions/index.js';

describe('createAliasTable', () => {
  it('builds the defaults without overrides', () => {
    const result = createAliasTable();

    expect(result.isOk()).toBe(true);
    if (result.isErr()) return;

    expect([...result.value.geo.entries()]).toEqual([['orissa', 'odisha']]);
    expect(result.value.table.get('andaman and nicobar')).toBe('andaman & nicobar islands');
    expect(result.value.table.get('orissa')).toBe('odisha');
  });

  it('normalizes override keys and values', () => {
    const result = createAliasTable({
      historical: { ' Uttaranchal ': 'UTTARAKHAND' },
      tabular: { 'Jammu and Kashmir': 'Jammu & Kashmir' },
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) return;

    expect(normalizeRegionName('uttaranchal', 'geo', result.value)).toBe('uttarakhand');
    expect(normalizeRegionName('Jammu and Kashmir', 'table', result.value)).toBe('jammu & kashmir');
    expect(normalizeRegionName('Jammu and Kashmir', 'geo', result.value)).toBe('jammu and kashmir');
  });

  it('lets overrides replace a default target', () => {
    const result = createAliasTable({ historical: { orissa: 'odisha state' } });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) return;

    expect(result.value.geo.get('orissa')).toBe('odisha state');
  });

  it('collapses chains to their final name', () => {
    const result = createAliasTable({ tabular: { 'state of orissa': 'orissa' } });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) return;

    expect(result.value.table.get('state of orissa')).toBe('odisha');
    expect(normalizeRegionName('State of Orissa', 'table', result.value)).toBe('odisha');
  });

  it('drops identity and empty entries', () => {
    const result = createAliasTable({ tabular: { goa: 'Goa', '': 'kerala', sikkim: ' ' } });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) return;

    expect(result.value.table.has('goa')).toBe(false);
    expect(result.value.table.has('')).toBe(false);
    expect(result.value.table.has('sikkim')).toBe(false);
  });

  it('rejects a cycle with the chain that closes it', () => {
    const result = createAliasTable({ historical: { alpha: 'beta' }, tabular: { beta: 'alpha' } });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) return;

    expect(result.error).toEqual({
      type: 'AliasCycle',
      message: 'Region aliases form a cycle: alpha -> beta -> alpha',
      chain: ['alpha', 'beta', 'alpha'],
    });
  });
});
