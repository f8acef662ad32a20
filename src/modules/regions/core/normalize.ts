/**
 * Region name normalization.
 *
 * Produces the canonical join key shared by the boundary dataset and every
 * payment table: lowercase, trimmed, alias-resolved. Missing or non-string
 * names become '' and must be treated as unmapped by callers.
 */

import { DEFAULT_ALIAS_TABLE, toBaseKey } from './aliases.js';

import type { RegionAliasTable, RegionSource } from './types.js';

export const normalizeRegionName = (
  raw: unknown,
  source: RegionSource,
  aliases: RegionAliasTable = DEFAULT_ALIAS_TABLE
): string => {
  if (typeof raw !== 'string') {
    return '';
  }

  const key = toBaseKey(raw);
  const lookup = source === 'geo' ? aliases.geo : aliases.table;

  return lookup.get(key) ?? key;
};

/**
 * Distinct non-empty keys that the reference does not know about, sorted.
 * These are the rows a choropleth will leave unfilled.
 */
export const findUnmatchedRegions = (
  keys: Iterable<string>,
  reference: ReadonlySet<string>
): string[] => {
  const unmatched = new Set<string>();

  for (const key of keys) {
    if (key !== '' && !reference.has(key)) {
      unmatched.add(key);
    }
  }

  return [...unmatched].sort();
};
