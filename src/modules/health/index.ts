/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';

export {
  makeDbHealthChecker,
  makeGeoReferenceHealthChecker,
  type DbHealthCheckerOptions,
} from './shell/checkers/index.js';

export { getReadiness, determineOverallStatus } from './core/usecases/get-readiness.js';

export type { GeoReferenceProbe, HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
