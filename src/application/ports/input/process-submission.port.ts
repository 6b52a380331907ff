import type { SubmissionOutcomeVO } from '../../../domain/value-objects/submission-outcome.vo';

/**
 * Process Submission Command
 */
export interface ProcessSubmissionCommand {
  submissionUrl: string;
  userEmail: string;
}

/**
 * Process Submission Port (Driving Port / Use Case Interface)
 * Validates, relays and reports one submission end-to-end
 */
export interface ProcessSubmissionPort {
  /**
   * Resolves with the outcome once the user has been notified and the
   * audit record written. Rejects only on unhandled errors.
   */
  execute(command: ProcessSubmissionCommand): Promise<SubmissionOutcomeVO>;
}
