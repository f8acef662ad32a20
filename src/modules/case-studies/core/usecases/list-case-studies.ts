import { ok, err, type Result } from 'neverthrow';

import { availablePeriods } from '../../../analytics/core/periods.js';
import { createUnknownCaseStudyError, type CaseStudyError } from '../errors.js';
import { CASE_STUDIES } from '../studies/index.js';
import {
  CASE_STUDY_IDS,
  isCaseStudyId,
  type CaseStudyPeriods,
  type CaseStudySummary,
} from '../types.js';

import type { CaseStudyDeps } from '../ports.js';

export const listCaseStudies = (): CaseStudySummary[] =>
  CASE_STUDY_IDS.map((id) => {
    const { title, objective, primaryDataset } = CASE_STUDIES[id];
    return { id, title, objective, primaryDataset };
  });

/**
 * Years and quarters selectable for a case study, from its primary dataset.
 */
export async function listPeriods(
  deps: Pick<CaseStudyDeps, 'tableLoader'>,
  caseStudyId: string
): Promise<Result<CaseStudyPeriods, CaseStudyError>> {
  if (!isCaseStudyId(caseStudyId)) {
    return err(createUnknownCaseStudyError(caseStudyId));
  }

  const { table } = await deps.tableLoader.load(CASE_STUDIES[caseStudyId].primaryDataset);

  return ok({ id: caseStudyId, periods: availablePeriods(table) });
}
