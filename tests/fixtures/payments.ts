/**
 * Small raw datasets shaped like the payments tables, for case-study and route tests.
 *
 * Region names are raw (as stored), so they pass through normalization.
 */

import type { DatasetId, RawRow } from '@/modules/datasets/index.js';

export type PaymentsData = Partial<Record<DatasetId, RawRow[]>>;

const transaction = (
  States: string,
  Years: number,
  Quarter: number,
  Transaction_type: string,
  Transaction_count: number,
  Transaction_amount: number
): RawRow => ({ States, Years, Quarter, Transaction_type, Transaction_count, Transaction_amount });

const insurance = (
  States: string,
  Years: number,
  Quarter: number,
  Insurance_count: number,
  Insurance_amount: number
): RawRow => ({
  States,
  Years,
  Quarter,
  Insurance_type: 'Insurance',
  Insurance_count,
  Insurance_amount,
});

const userBrand = (
  States: string,
  Brands: string,
  Transaction_count: number
): RawRow => ({ States, Years: 2023, Quarter: 1, Brands, Transaction_count, Percentage: 0.1 });

const districtUsers = (
  States: string,
  Years: number,
  Quarter: number,
  District: string,
  RegisteredUsers: number,
  AppOpens: number
): RawRow => ({ States, Years, Quarter, District, RegisteredUsers, AppOpens });

const districtTransactions = (
  States: string,
  District: string,
  Transaction_count: number,
  Transaction_amount: number
): RawRow => ({ States, Years: 2023, Quarter: 1, District, Transaction_count, Transaction_amount });

/**
 * Latest periods: transactions 2023 Q1, insurance 2023 Q2, users 2023 Q1,
 * district transactions 2023 Q1.
 */
export const makePaymentsData = (): PaymentsData => ({
  aggregated_transaction: [
    transaction('Maharashtra', 2022, 4, 'Peer-to-peer payments', 100, 1000),
    transaction('Maharashtra', 2023, 1, 'Peer-to-peer payments', 200, 4000),
    transaction('Maharashtra', 2023, 1, 'Merchant payments', 100, 1000),
    transaction('Orissa', 2023, 1, 'Peer-to-peer payments', 50, 3_000_000),
    transaction('Ladakh', 2023, 1, 'Merchant payments', 0, 0),
  ],
  aggregated_insurance: [
    insurance('Maharashtra', 2023, 1, 9, 1000),
    insurance('Maharashtra', 2023, 1, 1, 500),
    insurance('Orissa', 2023, 2, 4, 2_000_000),
    insurance('Orissa', 2022, 1, 1, 100),
  ],
  aggregated_user: [
    userBrand('Maharashtra', 'Xiaomi', 30),
    userBrand('Maharashtra', 'Samsung', 50),
    userBrand('Karnataka', 'Xiaomi', 40),
  ],
  map_user: [
    districtUsers('Maharashtra', 2023, 1, 'pune district', 2000, 10_000),
    districtUsers('Maharashtra', 2023, 1, 'thane district', 1000, 0),
    districtUsers('Karnataka', 2023, 1, 'bengaluru urban district', 4000, 3999),
    districtUsers('Maharashtra', 2022, 4, 'pune district', 1500, 500),
  ],
  map_transaction: [
    districtTransactions('Maharashtra', 'pune district', 10, 2_000_000),
    districtTransactions('Maharashtra', 'thane district', 30, 2_000_000),
    districtTransactions('Orissa', 'khordha district', 0, 0),
    districtTransactions('Karnataka', 'bengaluru urban district', 100, 1_000_000),
  ],
});

/**
 * Totals sized for the dashboard's headline units.
 */
export const makeDashboardData = (): PaymentsData => ({
  aggregated_transaction: [
    transaction('Maharashtra', 2023, 1, 'Peer-to-peer payments', 1_000_000_000, 1_000_000_000_000),
    transaction('Orissa', 2023, 2, 'Merchant payments', 500_000_000, 1_500_000_000_000),
  ],
  top_user: [
    { States: 'Maharashtra', Years: 2023, Quarter: 1, Pincodes: '400001', Registered_Users: 2_400_000 },
  ],
  aggregated_insurance: [insurance('Maharashtra', 2023, 1, 10, 3_000_000_000)],
});
