import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: readonly HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * A checker that throws counts as a critical failure.
 */
const toCheckResult = (result: PromiseSettledResult<HealthCheckResult>): HealthCheckResult =>
  result.status === 'fulfilled'
    ? result.value
    : {
        name: 'unknown',
        status: 'unhealthy',
        message: result.reason instanceof Error ? result.reason.message : 'Check failed',
        critical: true,
      };

/**
 * - any critical check unhealthy     → 'unhealthy'
 * - any non-critical check unhealthy → 'degraded'
 * - otherwise                        → 'ok'
 */
export const determineOverallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((c) => c.status === 'unhealthy');

  if (failed.some((c) => c.critical !== false)) return 'unhealthy';
  if (failed.length > 0) return 'degraded';
  return 'ok';
};

export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const settled = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
