import type { HealthCheckResult } from './types.js';

/**
 * Probes one dependency. Checkers resolve with an unhealthy result instead of
 * rejecting; a rejection is reported as an unhealthy critical check.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;

/**
 * The part of the geographic reference the readiness check reads.
 */
export interface GeoReferenceProbe {
  get(): Promise<{ keys: ReadonlySet<string> }>;
}
