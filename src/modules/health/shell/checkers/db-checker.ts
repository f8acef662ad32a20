/**
 * Database health checker
 *
 * Runs `SELECT 1` against the payments database. A query slower than the
 * timeout counts as a failure.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Default: 'database' */
  name?: string;
  /** Default: 3000 */
  timeoutMs?: number;
}

export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'database', timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async () => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
      }, timeoutMs);
    });

    try {
      await Promise.race([sql`SELECT 1`.execute(db), timeout]);

      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
