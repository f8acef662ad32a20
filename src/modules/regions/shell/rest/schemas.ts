import { Type, type Static } from '@sinclair/typebox';

import { DatasetIdSchema } from '../../../datasets/core/types.js';

export const UnmatchedRegionsParamsSchema = Type.Object({
  datasetId: DatasetIdSchema,
});

export type UnmatchedRegionsParams = Static<typeof UnmatchedRegionsParamsSchema>;

export const UnmatchedRegionsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    datasetId: DatasetIdSchema,
    /** Canonical keys in the dataset that the boundary dataset does not contain */
    unmatched: Type.Array(Type.String()),
    /** Rows whose region name was missing */
    unmappedRows: Type.Number(),
    notice: Type.Optional(Type.String()),
  }),
});
