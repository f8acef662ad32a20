/**
 * Region alias table construction.
 *
 * Historical renames apply to every source; the multi-word spellings only
 * show up in the payment tables. Override entries are lowercased, trimmed and
 * merged over the defaults, then every chain (a -> b -> c) is collapsed to its
 * final name.
 */

import { err, ok, type Result } from 'neverthrow';

import { createAliasCycleError, type RegionsError } from './errors.js';

import type { RegionAliasFile, RegionAliasTable } from './types.js';

export const DEFAULT_HISTORICAL_ALIASES: Readonly<Record<string, string>> = {
  orissa: 'odisha',
};

export const DEFAULT_TABULAR_ALIASES: Readonly<Record<string, string>> = {
  'andaman and nicobar': 'andaman & nicobar islands',
  'dadra and nagar haveli and daman and diu': 'dadra & nagar haveli & daman & diu',
};

/**
 * Lowercase and trim, the base step of every canonical key.
 */
export const toBaseKey = (name: string): string => name.toLowerCase().trim();

const toLookup = (...sources: (Readonly<Record<string, string>> | undefined)[]) => {
  const lookup = new Map<string, string>();

  for (const source of sources) {
    if (source === undefined) continue;

    for (const [from, to] of Object.entries(source)) {
      const key = toBaseKey(from);
      const value = toBaseKey(to);
      // An empty side would either match every blank name or erase a real one
      if (key === '' || value === '') continue;
      lookup.set(key, value);
    }
  }

  return lookup;
};

/**
 * Follow `lookup` from `start` until a name maps to nothing (or itself).
 */
const resolveChain = (
  start: string,
  lookup: ReadonlyMap<string, string>
): Result<string, RegionsError> => {
  const chain = [start];
  let current = start;

  for (;;) {
    const next = lookup.get(current);
    if (next === undefined || next === current) {
      return ok(current);
    }
    if (chain.includes(next)) {
      return err(createAliasCycleError([...chain, next]));
    }
    chain.push(next);
    current = next;
  }
};

const resolveAll = (
  lookup: ReadonlyMap<string, string>
): Result<Map<string, string>, RegionsError> => {
  const resolved = new Map<string, string>();

  for (const key of lookup.keys()) {
    const result = resolveChain(key, lookup);
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value !== key) {
      resolved.set(key, result.value);
    }
  }

  return ok(resolved);
};

/**
 * Build the alias table from the defaults and optional overrides.
 * Fails only when the merged aliases contain a cycle.
 */
export const createAliasTable = (
  overrides: RegionAliasFile = {}
): Result<RegionAliasTable, RegionsError> => {
  const historical = toLookup(DEFAULT_HISTORICAL_ALIASES, overrides.historical);
  // Historical renames first so a table spelling can point at an old name and still resolve
  const combined = toLookup(
    DEFAULT_HISTORICAL_ALIASES,
    overrides.historical,
    DEFAULT_TABULAR_ALIASES,
    overrides.tabular
  );

  const geo = resolveAll(historical);
  if (geo.isErr()) {
    return err(geo.error);
  }

  const table = resolveAll(combined);
  if (table.isErr()) {
    return err(table.error);
  }

  return ok({ geo: geo.value, table: table.value });
};

/**
 * The built-in table. The defaults are acyclic, so construction cannot fail.
 */
export const DEFAULT_ALIAS_TABLE: RegionAliasTable = createAliasTable().match(
  (table) => table,
  (error) => {
    throw new Error(error.message);
  }
);
