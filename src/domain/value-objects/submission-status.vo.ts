/**
 * Submission Status
 * Terminal classification of one processing attempt
 */
export enum SubmissionStatus {
  SUCCESS = 'SUCCESS',
  EMPTY = 'EMPTY',
  INVALID_FORMAT = 'INVALID_FORMAT',
  FETCH_FAILED = 'FETCH_FAILED',
  /** Only produced when upload failures are configured to be reported */
  UPLOAD_FAILED = 'UPLOAD_FAILED',
}

export const SUBMISSION_ERROR_MESSAGES = {
  [SubmissionStatus.INVALID_FORMAT]: 'Invalid file format. Only ZIP files are supported.',
  [SubmissionStatus.FETCH_FAILED]: 'The URL does not exist.',
  [SubmissionStatus.UPLOAD_FAILED]: 'We could not store your submission. Please try again later.',
} as const;
