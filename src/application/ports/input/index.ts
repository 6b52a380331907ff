/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 */
export type {
  ProcessSubmissionPort,
  ProcessSubmissionCommand,
} from './process-submission.port';

export const PROCESS_SUBMISSION_PORT = 'ProcessSubmissionPort';
