import { err, ok, type Result } from 'neverthrow';

import { createAliasTable, DEFAULT_ALIAS_TABLE } from '../aliases.js';

import type { RegionsError } from '../errors.js';
import type { RegionAliasSource } from '../ports.js';
import type { RegionAliasTable } from '../types.js';

export interface LoadRegionAliasesDeps {
  /** Optional override file; the built-in table is used when absent */
  source?: RegionAliasSource | undefined;
}

/**
 * Builds the alias table used by every normalizer in the process.
 */
export async function loadRegionAliases(
  deps: LoadRegionAliasesDeps
): Promise<Result<RegionAliasTable, RegionsError>> {
  if (deps.source === undefined) {
    return ok(DEFAULT_ALIAS_TABLE);
  }

  const overrides = await deps.source.load();
  if (overrides.isErr()) {
    return err(overrides.error);
  }

  return createAliasTable(overrides.value);
}
