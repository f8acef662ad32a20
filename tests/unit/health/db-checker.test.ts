/**
 * Unit tests for database health checker
 *
 * These tests focus on behavior rather than exact timing to avoid flakiness.
 */

import { describe, it, expect } from 'vitest';

import { makeDbHealthChecker } from '@/modules/health/shell/checkers/db-checker.js';

import { makeFakeDatabase } from '../../fixtures/fakes.js';

describe('makeDbHealthChecker', () => {
  describe('healthy database', () => {
    it('returns healthy status when query succeeds', async () => {
      const { db } = makeFakeDatabase();
      const checker = makeDbHealthChecker(db);

      const result = await checker();

      expect(result.name).toBe('database');
      expect(result.status).toBe('healthy');
      expect(result.critical).toBe(true);
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
      expect(result.message).toBeUndefined();
    });

    it('sends SELECT 1', async () => {
      const { db, executed } = makeFakeDatabase();

      await makeDbHealthChecker(db)();

      expect(executed).toEqual(['SELECT 1']);
    });

    it('measures latency for slow queries', async () => {
      const { db } = makeFakeDatabase({ delayMs: 100 });
      const checker = makeDbHealthChecker(db);

      const result = await checker();

      expect(result.status).toBe('healthy');
      expect(result.latencyMs).toBeGreaterThan(50);
    });

    it('uses custom name', async () => {
      const { db } = makeFakeDatabase();
      const checker = makeDbHealthChecker(db, { name: 'payments-db' });

      const result = await checker();

      expect(result.name).toBe('payments-db');
    });
  });

  describe('unhealthy database', () => {
    it('returns unhealthy status when query fails', async () => {
      const { db } = makeFakeDatabase({ failWithError: new Error('Connection refused') });
      const checker = makeDbHealthChecker(db);

      const result = await checker();

      expect(result.name).toBe('database');
      expect(result.status).toBe('unhealthy');
      expect(result.critical).toBe(true);
      expect(result.message).toBe('Connection refused');
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('returns unhealthy status when query times out', async () => {
      const slowDelayMs = 1000;
      const { db } = makeFakeDatabase({ delayMs: slowDelayMs });
      const checker = makeDbHealthChecker(db, { timeoutMs: 50 });

      const result = await checker();

      expect(result.status).toBe('unhealthy');
      expect(result.message).toBe('Database health check timed out after 50ms');
      expect(result.latencyMs).toBeLessThan(slowDelayMs / 2);
    });

    it('succeeds when query completes before timeout', async () => {
      const { db } = makeFakeDatabase({ delayMs: 10 });
      const checker = makeDbHealthChecker(db, { timeoutMs: 500 });

      const result = await checker();

      expect(result.status).toBe('healthy');
    });
  });
});
