/**
 * Integration tests for the dashboard and case-study endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { makeTestApp } from '../fixtures/app.js';
import { makeDashboardData, makePaymentsData } from '../fixtures/payments.js';

import type { FastifyInstance } from 'fastify';

describe('Case Study REST API', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  describe('GET /api/v1/dashboard', () => {
    it('returns quick stats and both panels', async () => {
      app = await makeTestApp({ data: makeDashboardData() });

      const response = await app.inject({ method: 'GET', url: '/api/v1/dashboard' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.ok).toBe(true);
      expect(body.data.stats.map((s: { display: string }) => s.display)).toEqual([
        '1.5B',
        '₹2.5T',
        '2.4M',
        '₹3.0B',
      ]);
      expect(body.data.period).toEqual({ year: 2023, quarter: 2 });
      expect(body.data.panels[0].chart.status).toBe('ok');
      expect(body.data.panels[0].chart.chart.geo.featureIdKey).toBe('properties.State_Name');
      expect(body.data.panels[1].chart.chart.xValues).toEqual(['2023 Q1', '2023 Q2']);
    });

    it('lists loader notices when the database is unavailable', async () => {
      app = await makeTestApp({ failing: ['aggregated_transaction'] });

      const response = await app.inject({ method: 'GET', url: '/api/v1/dashboard' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.data.notices).toEqual([
        "Data for 'aggregated_transaction' is unavailable. Database error: connection refused",
      ]);
      expect(body.data.panels[0].chart).toEqual({
        status: 'no_data',
        message: 'No data available for the map.',
      });
    });
  });

  describe('GET /api/v1/case-studies', () => {
    it('lists the five case studies', async () => {
      app = await makeTestApp();

      const response = await app.inject({ method: 'GET', url: '/api/v1/case-studies' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.data.map((s: { id: string }) => s.id)).toEqual([
        'transaction-dynamics',
        'device-engagement',
        'insurance-market',
        'market-expansion',
        'user-growth',
      ]);
    });
  });

  describe('GET /api/v1/case-studies/:caseStudyId/periods', () => {
    it('returns the selectable periods', async () => {
      app = await makeTestApp({ data: makePaymentsData() });

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/case-studies/transaction-dynamics/periods',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: {
          id: 'transaction-dynamics',
          periods: [
            { year: 2022, quarters: [4] },
            { year: 2023, quarters: [1] },
          ],
        },
      });
    });

    it('rejects unknown case study ids', async () => {
      app = await makeTestApp();

      const response = await app.inject({ method: 'GET', url: '/api/v1/case-studies/fraud/periods' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });
  });

  describe('GET /api/v1/case-studies/:caseStudyId', () => {
    it('returns the panels of the latest period', async () => {
      app = await makeTestApp({ data: makePaymentsData() });

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/case-studies/user-growth',
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.data.id).toBe('user-growth');
      expect(body.data.period).toEqual({ year: 2023, quarter: 1 });
      expect(body.data.panels.map((p: { id: string }) => p.id)).toEqual([
        'state-heatmap',
        'engagement-rate',
        'quarterly-growth',
        'top-districts',
        'users-vs-app-opens',
      ]);
      expect(body.data.notice).toBeUndefined();
    });

    it('coerces the period query', async () => {
      app = await makeTestApp({ data: makePaymentsData() });

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/case-studies/transaction-dynamics?year=2022&quarter=4',
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.data.period).toEqual({ year: 2022, quarter: 4 });
      expect(body.data.panels[0].chart.chart.title).toBe('Transaction Heatmap - 2022 Q4');
    });

    it('returns a notice for a period without data', async () => {
      app = await makeTestApp({ data: makePaymentsData() });

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/case-studies/insurance-market?year=2020&quarter=3',
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.data.panels).toEqual([]);
      expect(body.data.notice).toBe('No insurance data available.');
    });

    it('rejects a quarter out of range', async () => {
      app = await makeTestApp();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/case-studies/user-growth?quarter=5',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });
  });
});
