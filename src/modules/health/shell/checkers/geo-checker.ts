/**
 * Geographic reference health checker
 *
 * Non-critical: without boundaries the maps render unfilled, but every other
 * chart still works.
 */

import type { GeoReferenceProbe, HealthChecker } from '../../core/ports.js';

export const makeGeoReferenceHealthChecker = (
  geoReference: GeoReferenceProbe,
  name = 'geo-reference'
): HealthChecker => {
  return async () => {
    const startTime = Date.now();
    const { keys } = await geoReference.get();
    const latencyMs = Date.now() - startTime;

    if (keys.size === 0) {
      return {
        name,
        status: 'unhealthy',
        message: 'Geographic reference has no regions',
        latencyMs,
        critical: false,
      };
    }

    return {
      name,
      status: 'healthy',
      message: `${String(keys.size)} regions`,
      latencyMs,
      critical: false,
    };
  };
};
