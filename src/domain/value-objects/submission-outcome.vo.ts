import { SUBMISSION_ERROR_MESSAGES, SubmissionStatus } from './submission-status.vo';

/**
 * Submission Outcome Value Object
 * Built once per invocation; drives both the status email and the audit record
 */
export class SubmissionOutcomeVO {
  private constructor(
    private readonly _status: SubmissionStatus,
    private readonly _fileSize?: number,
    private readonly _destinationPath?: string,
    private readonly _errorMessage?: string,
  ) {}

  static invalidFormat(): SubmissionOutcomeVO {
    return new SubmissionOutcomeVO(
      SubmissionStatus.INVALID_FORMAT,
      undefined,
      undefined,
      SUBMISSION_ERROR_MESSAGES[SubmissionStatus.INVALID_FORMAT],
    );
  }

  static fetchFailed(): SubmissionOutcomeVO {
    return new SubmissionOutcomeVO(
      SubmissionStatus.FETCH_FAILED,
      undefined,
      undefined,
      SUBMISSION_ERROR_MESSAGES[SubmissionStatus.FETCH_FAILED],
    );
  }

  static empty(): SubmissionOutcomeVO {
    return new SubmissionOutcomeVO(SubmissionStatus.EMPTY, 0);
  }

  static success(fileSize: number, destinationPath: string): SubmissionOutcomeVO {
    if (!Number.isInteger(fileSize) || fileSize <= 0) {
      throw new Error(`Successful submission must have a positive size, got ${fileSize}`);
    }
    if (!destinationPath) {
      throw new Error('Successful submission must have a destination path');
    }
    return new SubmissionOutcomeVO(SubmissionStatus.SUCCESS, fileSize, destinationPath);
  }

  static uploadFailed(fileSize: number): SubmissionOutcomeVO {
    return new SubmissionOutcomeVO(
      SubmissionStatus.UPLOAD_FAILED,
      fileSize,
      undefined,
      SUBMISSION_ERROR_MESSAGES[SubmissionStatus.UPLOAD_FAILED],
    );
  }

  get status(): SubmissionStatus {
    return this._status;
  }

  get fileSize(): number | undefined {
    return this._fileSize;
  }

  get destinationPath(): string | undefined {
    return this._destinationPath;
  }

  get errorMessage(): string | undefined {
    return this._errorMessage;
  }

  hasError(): boolean {
    return this._errorMessage !== undefined;
  }

  isSuccess(): boolean {
    return this._status === SubmissionStatus.SUCCESS;
  }

  isEmpty(): boolean {
    return this._status === SubmissionStatus.EMPTY;
  }

  toJSON() {
    return {
      status: this._status,
      fileSize: this._fileSize,
      destinationPath: this._destinationPath,
      errorMessage: this._errorMessage,
    };
  }
}
