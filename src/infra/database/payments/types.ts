// Column names mirror the published payment aggregates, so they keep their original casing

import type { ColumnType } from 'kysely';

/**
 * PostgreSQL returns `numeric` and `bigint` columns as strings.
 */
export type Numeric = ColumnType<string, string | number, string | number>;
export type BigCount = ColumnType<string, string | number, string | number>;

interface PeriodColumns {
  States: string | null;
  Years: number;
  Quarter: number;
}

export interface AggregatedTransaction extends PeriodColumns {
  Transaction_type: string;
  Transaction_count: BigCount;
  Transaction_amount: Numeric;
}

export interface AggregatedInsurance extends PeriodColumns {
  Insurance_type: string;
  Insurance_count: BigCount;
  Insurance_amount: Numeric;
}

export interface AggregatedUser extends PeriodColumns {
  Brands: string;
  Transaction_count: BigCount;
  Percentage: Numeric;
}

export interface MapTransaction extends PeriodColumns {
  District: string;
  Transaction_count: BigCount;
  Transaction_amount: Numeric;
}

export interface MapInsurance extends PeriodColumns {
  District: string;
  Insurance_count: BigCount;
  Insurance_amount: Numeric;
}

export interface MapUser extends PeriodColumns {
  District: string;
  RegisteredUsers: BigCount;
  AppOpens: BigCount;
}

export interface TopTransaction extends PeriodColumns {
  Pincodes: string;
  Transaction_count: BigCount;
  Transaction_amount: Numeric;
}

export interface TopInsurance extends PeriodColumns {
  Pincodes: string;
  Insurance_count: BigCount;
  Insurance_amount: Numeric;
}

export interface TopUser extends PeriodColumns {
  Pincodes: string;
  Registered_Users: BigCount;
}

export interface PaymentsDatabase {
  aggregated_transaction: AggregatedTransaction;
  aggregated_insurance: AggregatedInsurance;
  aggregated_user: AggregatedUser;
  map_transaction: MapTransaction;
  map_insurance: MapInsurance;
  map_user: MapUser;
  top_transaction: TopTransaction;
  top_insurance: TopInsurance;
  top_user: TopUser;
}

export type PaymentsTableName = keyof PaymentsDatabase;
