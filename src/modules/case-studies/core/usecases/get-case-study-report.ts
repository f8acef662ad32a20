/**
 * Get Case Study Report Use Case
 *
 * 1. Load every dataset the case study reads (memoized by the loader)
 * 2. Resolve the period against the primary dataset
 * 3. Build the panels, or return a notice when the period has no rows
 */

import { ok, err, type Result } from 'neverthrow';

import { EMPTY_TABLE, isEmptyTable, type DataTable } from '../../../../common/types/table.js';
import { selectPeriod } from '../../../analytics/core/periods.js';
import { createUnknownCaseStudyError, type CaseStudyError } from '../errors.js';
import { CASE_STUDIES } from '../studies/index.js';
import { isCaseStudyId, type CaseStudyReport, type PeriodSelection } from '../types.js';

import { resolvePeriod } from './resolve-period.js';

import type { DatasetId } from '../../../datasets/core/types.js';
import type { CaseStudyDeps } from '../ports.js';

export interface GetCaseStudyReportInput extends PeriodSelection {
  caseStudyId: string;
}

export async function getCaseStudyReport(
  deps: CaseStudyDeps,
  input: GetCaseStudyReportInput
): Promise<Result<CaseStudyReport, CaseStudyError>> {
  const { caseStudyId } = input;
  if (!isCaseStudyId(caseStudyId)) {
    return err(createUnknownCaseStudyError(caseStudyId));
  }

  const definition = CASE_STUDIES[caseStudyId];

  const [loaded, geo] = await Promise.all([
    Promise.all(
      definition.datasets.map(
        async (datasetId) => [datasetId, await deps.tableLoader.load(datasetId)] as const
      )
    ),
    deps.geoReference.get(),
  ]);

  const tables = new Map<DatasetId, DataTable>(
    loaded.map(([datasetId, result]) => [datasetId, result.table])
  );
  const table = (datasetId: DatasetId): DataTable => tables.get(datasetId) ?? EMPTY_TABLE;
  const loadNotices = loaded.flatMap(([, result]) =>
    result.notice !== undefined ? [result.notice] : []
  );

  const header = {
    id: caseStudyId,
    title: definition.title,
    objective: definition.objective,
  };

  const period = resolvePeriod(table(definition.primaryDataset), input);
  const hasRows =
    period !== null &&
    definition.requiredForPeriod.every(
      (datasetId) => !isEmptyTable(selectPeriod(table(datasetId), period))
    );

  if (period === null || !hasRows) {
    return ok({
      ...header,
      period,
      panels: [],
      notice: [...loadNotices, definition.emptyNotice].join(' '),
    });
  }

  const panels = definition.build({ period, geoKeys: geo.keys, table });

  return ok({
    ...header,
    period,
    panels,
    ...(loadNotices.length > 0 && { notice: loadNotices.join(' ') }),
  });
}
