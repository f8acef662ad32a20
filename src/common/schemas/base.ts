/**
 * Common TypeBox schemas used across modules
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Standard error response
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Optional(Type.Literal(false)),
  error: Type.String({ description: 'Error type code' }),
  message: Type.String({ description: 'Human-readable error message' }),
  details: Type.Optional(Type.Unknown({ description: 'Additional error details' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
