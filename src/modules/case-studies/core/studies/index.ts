import { deviceEngagement } from './device-engagement.js';
import { insuranceMarket } from './insurance-market.js';
import { marketExpansion } from './market-expansion.js';
import { transactionDynamics } from './transaction-dynamics.js';
import { userGrowth } from './user-growth.js';

import type { CaseStudyDefinition, CaseStudyId } from '../types.js';

/**
 * Every case study id maps to exactly one definition.
 */
export const CASE_STUDIES: Readonly<Record<CaseStudyId, CaseStudyDefinition>> = {
  'transaction-dynamics': transactionDynamics,
  'device-engagement': deviceEngagement,
  'insurance-market': insuranceMarket,
  'market-expansion': marketExpansion,
  'user-growth': userGrowth,
};
