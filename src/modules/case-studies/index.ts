/**
 * Case Studies Module Public API
 *
 * Business analyses and the dashboard overview, assembled as chart specifications.
 */

// ============================================================================
// Core
// ============================================================================

export {
  CASE_STUDY_IDS,
  CaseStudyIdSchema,
  isCaseStudyId,
  type CaseStudyId,
  type CaseStudyContext,
  type CaseStudyDefinition,
  type CaseStudyPeriods,
  type CaseStudyReport,
  type CaseStudySummary,
  type Dashboard,
  type Panel,
  type PeriodSelection,
  type QuickStat,
  type QuickStatId,
} from './core/types.js';

export {
  createUnknownCaseStudyError,
  getHttpStatusForError,
  type CaseStudyError,
  type UnknownCaseStudyError,
} from './core/errors.js';

export type { CaseStudyDeps, GeoKeysProvider } from './core/ports.js';

export { CASE_STUDIES } from './core/studies/index.js';
export { resolvePeriod } from './core/usecases/resolve-period.js';
export {
  getCaseStudyReport,
  type GetCaseStudyReportInput,
} from './core/usecases/get-case-study-report.js';
export { listCaseStudies, listPeriods } from './core/usecases/list-case-studies.js';
export { getDashboard } from './core/usecases/get-dashboard.js';

// ============================================================================
// Shell
// ============================================================================

export { makeCaseStudyRoutes, type MakeCaseStudyRoutesDeps } from './shell/rest/routes.js';
