import type { ValueError } from '@sinclair/typebox/errors';

export type RegionsError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'AliasCycle'; message: string; chain: string[] };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

export const createAliasCycleError = (chain: string[]): RegionsError => ({
  type: 'AliasCycle',
  message: `Region aliases form a cycle: ${chain.join(' -> ')}`,
  chain,
});

export const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
