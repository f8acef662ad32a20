/**
 * Case Studies REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { DatasetIdSchema } from '../../../datasets/core/types.js';
import { CaseStudyIdSchema } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const CaseStudyParamsSchema = Type.Object(
  {
    caseStudyId: CaseStudyIdSchema,
  },
  { additionalProperties: false }
);

export type CaseStudyParams = Static<typeof CaseStudyParamsSchema>;

export const PeriodQuerySchema = Type.Object(
  {
    year: Type.Optional(Type.Integer({ minimum: 1900, maximum: 2100 })),
    quarter: Type.Optional(Type.Integer({ minimum: 1, maximum: 4 })),
  },
  { additionalProperties: false }
);

export type PeriodQuery = Static<typeof PeriodQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const PeriodSchema = Type.Object({
  year: Type.Number(),
  quarter: Type.Number(),
});

/**
 * Chart specifications vary by kind and are passed through as-is.
 */
const PanelSchema = Type.Object({
  id: Type.String(),
  heading: Type.String(),
  chart: Type.Unknown(),
});

export const ListCaseStudiesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(
    Type.Object({
      id: CaseStudyIdSchema,
      title: Type.String(),
      objective: Type.String(),
      primaryDataset: DatasetIdSchema,
    })
  ),
});

export const CaseStudyPeriodsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    id: CaseStudyIdSchema,
    periods: Type.Array(
      Type.Object({
        year: Type.Number(),
        quarters: Type.Array(Type.Number()),
      })
    ),
  }),
});

export const CaseStudyReportResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    id: CaseStudyIdSchema,
    title: Type.String(),
    objective: Type.String(),
    period: Type.Union([PeriodSchema, Type.Null()]),
    panels: Type.Array(PanelSchema),
    notice: Type.Optional(Type.String()),
  }),
});

export const DashboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    stats: Type.Array(
      Type.Object({
        id: Type.String(),
        label: Type.String(),
        value: Type.Number(),
        display: Type.String(),
      })
    ),
    period: Type.Union([PeriodSchema, Type.Null()]),
    panels: Type.Array(PanelSchema),
    notices: Type.Array(Type.String()),
  }),
});
