import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { PaymentsDatabase } from './payments/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type PaymentsDbClient = Kysely<PaymentsDatabase>;

/**
 * Create a Kysely instance for a specific database URL.
 * The pool connects lazily, so an unreachable server surfaces on the first query.
 */
const createClient = <T>(connectionString: string, max: number): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max,
        application_name: 'payment-insights-server',
      }),
    }),
  });
};

/**
 * Initialize the payments database client
 */
export const initDatabase = (config: AppConfig): PaymentsDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for Payments Database (DATABASE_URL)');
  }

  return createClient<PaymentsDatabase>(database.url, database.poolMax);
};

// Re-export types
export * from './payments/types.js';
