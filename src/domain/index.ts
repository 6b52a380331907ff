/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and has no external dependencies.
 */

// Entities
export {
  AuditRecordEntity,
  DownloadStatus,
  NO_DESTINATION,
  type AuditRecordEntityData,
  type CreateAuditRecordProps,
} from './entities/audit-record.entity';

// Value Objects
export { SubmissionEventVO, type SubmissionEventProps } from './value-objects/submission-event.vo';
export { SubmissionOutcomeVO } from './value-objects/submission-outcome.vo';
export { SubmissionStatus, SUBMISSION_ERROR_MESSAGES } from './value-objects/submission-status.vo';
export { StatusReportVO } from './value-objects/status-report.vo';
