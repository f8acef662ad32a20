/**
 * Year/quarter selection used by every period-filtered analysis.
 */

/** Column names carried by every payment table */
export const YEAR_COLUMN = 'Years';
export const QUARTER_COLUMN = 'Quarter';

export interface Period {
  year: number;
  quarter: number;
}

/**
 * Display label, e.g. "2023 Q1".
 */
export const formatPeriod = (period: Period): string =>
  `${String(period.year)} Q${String(period.quarter)}`;
