/**
 * Case Studies Module - Core Types
 */

import { Type, type Static } from '@sinclair/typebox';

import type { Period } from '../../../common/types/period.js';
import type { DataTable } from '../../../common/types/table.js';
import type { PeriodAvailability } from '../../analytics/core/types.js';
import type { ChartResult } from '../../charts/core/types.js';
import type { DatasetId } from '../../datasets/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────────────────

export const CaseStudyIdSchema = Type.Union([
  Type.Literal('transaction-dynamics'),
  Type.Literal('device-engagement'),
  Type.Literal('insurance-market'),
  Type.Literal('market-expansion'),
  Type.Literal('user-growth'),
]);

export type CaseStudyId = Static<typeof CaseStudyIdSchema>;

export const CASE_STUDY_IDS: readonly CaseStudyId[] = [
  'transaction-dynamics',
  'device-engagement',
  'insurance-market',
  'market-expansion',
  'user-growth',
];

export const isCaseStudyId = (value: string): value is CaseStudyId =>
  CASE_STUDY_IDS.some((id) => id === value);

// ─────────────────────────────────────────────────────────────────────────────
// Reports
// ─────────────────────────────────────────────────────────────────────────────

export interface Panel {
  id: string;
  heading: string;
  chart: ChartResult;
}

export interface CaseStudyReport {
  id: CaseStudyId;
  title: string;
  objective: string;
  /** Selected period; null when the primary dataset has nothing to select from */
  period: Period | null;
  panels: Panel[];
  notice?: string;
}

export interface CaseStudySummary {
  id: CaseStudyId;
  title: string;
  objective: string;
  primaryDataset: DatasetId;
}

export interface CaseStudyPeriods {
  id: CaseStudyId;
  periods: PeriodAvailability[];
}

export interface PeriodSelection {
  year?: number;
  quarter?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Definitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What a case study's panel builder gets to work with. Tables are the full
 * (unfiltered) datasets; each study selects the period itself.
 */
export interface CaseStudyContext {
  period: Period;
  geoKeys: ReadonlySet<string>;
  table: (datasetId: DatasetId) => DataTable;
}

export interface CaseStudyDefinition {
  title: string;
  objective: string;
  /** Dataset whose years and quarters drive the period selection */
  primaryDataset: DatasetId;
  /** Every dataset the panels read */
  datasets: readonly DatasetId[];
  /** Datasets that must have rows in the selected period, else `emptyNotice` */
  requiredForPeriod: readonly DatasetId[];
  emptyNotice: string;
  build(context: CaseStudyContext): Panel[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Dashboard
// ─────────────────────────────────────────────────────────────────────────────

export type QuickStatId =
  | 'total-transactions'
  | 'total-amount'
  | 'registered-users'
  | 'insurance-amount';

export interface QuickStat {
  id: QuickStatId;
  label: string;
  /** Raw total */
  value: number;
  /** Scaled and formatted, e.g. "₹1.2T" */
  display: string;
}

export interface Dashboard {
  stats: QuickStat[];
  /** Period shown on the heatmap */
  period: Period | null;
  panels: Panel[];
  notices: string[];
}
