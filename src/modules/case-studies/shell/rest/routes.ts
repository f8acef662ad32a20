/**
 * Case Studies REST Routes
 *
 * - GET /api/v1/dashboard                              - quick stats, heatmap and trend
 * - GET /api/v1/case-studies                           - available case studies
 * - GET /api/v1/case-studies/:caseStudyId/periods      - selectable years and quarters
 * - GET /api/v1/case-studies/:caseStudyId?year&quarter - panels for one period
 */

import { ErrorResponseSchema } from '../../../../common/schemas/base.js';
import { getHttpStatusForError, type CaseStudyError } from '../../core/errors.js';
import { getCaseStudyReport } from '../../core/usecases/get-case-study-report.js';
import { getDashboard } from '../../core/usecases/get-dashboard.js';
import { listCaseStudies, listPeriods } from '../../core/usecases/list-case-studies.js';

import {
  CaseStudyParamsSchema,
  CaseStudyPeriodsResponseSchema,
  CaseStudyReportResponseSchema,
  DashboardResponseSchema,
  ListCaseStudiesResponseSchema,
  PeriodQuerySchema,
  type CaseStudyParams,
  type PeriodQuery,
} from './schemas.js';

import type { CaseStudyDeps } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

export type MakeCaseStudyRoutesDeps = CaseStudyDeps;

function sendError(reply: FastifyReply, error: CaseStudyError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

export const makeCaseStudyRoutes = (deps: MakeCaseStudyRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get(
      '/api/v1/dashboard',
      {
        schema: {
          response: {
            200: DashboardResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const dashboard = await getDashboard(deps);
        return reply.status(200).send({ ok: true, data: dashboard });
      }
    );

    fastify.get(
      '/api/v1/case-studies',
      {
        schema: {
          response: {
            200: ListCaseStudiesResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ ok: true, data: listCaseStudies() });
      }
    );

    fastify.get<{ Params: CaseStudyParams }>(
      '/api/v1/case-studies/:caseStudyId/periods',
      {
        schema: {
          params: CaseStudyParamsSchema,
          response: {
            200: CaseStudyPeriodsResponseSchema,
            404: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await listPeriods(deps, request.params.caseStudyId);

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    fastify.get<{ Params: CaseStudyParams; Querystring: PeriodQuery }>(
      '/api/v1/case-studies/:caseStudyId',
      {
        schema: {
          params: CaseStudyParamsSchema,
          querystring: PeriodQuerySchema,
          response: {
            200: CaseStudyReportResponseSchema,
            404: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { caseStudyId } = request.params;
        const { year, quarter } = request.query;

        const result = await getCaseStudyReport(deps, {
          caseStudyId,
          ...(year !== undefined && { year }),
          ...(quarter !== undefined && { quarter }),
        });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const report = result.value;
        if (report.notice !== undefined) {
          request.log.info({ caseStudyId, period: report.period }, report.notice);
        }

        return reply.status(200).send({ ok: true, data: report });
      }
    );
  };
};
