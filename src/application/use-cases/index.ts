/**
 * Use Cases Barrel Export
 */
export { ProcessSubmissionUseCase } from './process-submission.use-case';
