import type { TableLoader } from '../../datasets/core/ports.js';

/**
 * Canonical region keys of the geographic reference.
 */
export interface GeoKeysProvider {
  get(): Promise<{ keys: ReadonlySet<string> }>;
}

export interface CaseStudyDeps {
  tableLoader: TableLoader;
  geoReference: GeoKeysProvider;
}
