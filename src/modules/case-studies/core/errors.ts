/**
 * Case Studies Module - Domain Errors
 */

export interface UnknownCaseStudyError {
  readonly type: 'UNKNOWN_CASE_STUDY';
  readonly caseStudyId: string;
  readonly message: string;
}

export type CaseStudyError = UnknownCaseStudyError;

export const createUnknownCaseStudyError = (caseStudyId: string): UnknownCaseStudyError => ({
  type: 'UNKNOWN_CASE_STUDY',
  caseStudyId,
  message: `Unknown case study '${caseStudyId}'`,
});

/**
 * HTTP status for a case study error.
 */
export const getHttpStatusForError = (error: CaseStudyError): number => {
  switch (error.type) {
    case 'UNKNOWN_CASE_STUDY':
      return 404;
  }
};
