import { SubmissionEventVO } from '../value-objects/submission-event.vo';
import { SubmissionOutcomeVO } from '../value-objects/submission-outcome.vo';

/**
 * Download status as stored in the audit table
 */
export enum DownloadStatus {
  SUCCESS = 'Success',
  NO_CONTENT = 'No Content',
}

export const NO_DESTINATION = 'N/A';

export interface AuditRecordEntityData {
  id: string;
  userEmail: string;
  submissionUrl: string;
  downloadStatus: DownloadStatus;
  emailSent: boolean;
  destinationPath: string;
  /** Epoch seconds */
  timestamp: number;
}

export interface CreateAuditRecordProps {
  id: string;
  event: SubmissionEventVO;
  outcome: SubmissionOutcomeVO;
  timestamp: number;
}

/**
 * Audit Record Entity
 * Append-only log entry for one handled submission. Immutable once created.
 */
export class AuditRecordEntity {
  private readonly data: Readonly<AuditRecordEntityData>;

  private constructor(data: AuditRecordEntityData) {
    this.data = Object.freeze({ ...data });
  }

  static create(props: CreateAuditRecordProps): AuditRecordEntity {
    if (!props.id) {
      throw new Error('Audit record id cannot be empty');
    }
    if (!Number.isInteger(props.timestamp) || props.timestamp < 0) {
      throw new Error(`Invalid audit timestamp: ${props.timestamp}`);
    }

    return new AuditRecordEntity({
      id: props.id,
      userEmail: props.event.userEmail,
      submissionUrl: props.event.submissionUrl,
      downloadStatus: props.outcome.isSuccess()
        ? DownloadStatus.SUCCESS
        : DownloadStatus.NO_CONTENT,
      // Mirrors whether a success-style report went out, not transport delivery
      emailSent: !props.outcome.hasError(),
      destinationPath: props.outcome.destinationPath ?? NO_DESTINATION,
      timestamp: props.timestamp,
    });
  }

  get id(): string {
    return this.data.id;
  }

  get userEmail(): string {
    return this.data.userEmail;
  }

  get submissionUrl(): string {
    return this.data.submissionUrl;
  }

  get downloadStatus(): DownloadStatus {
    return this.data.downloadStatus;
  }

  get emailSent(): boolean {
    return this.data.emailSent;
  }

  get destinationPath(): string {
    return this.data.destinationPath;
  }

  get timestamp(): number {
    return this.data.timestamp;
  }

  toJSON(): AuditRecordEntityData {
    return { ...this.data };
  }
}
