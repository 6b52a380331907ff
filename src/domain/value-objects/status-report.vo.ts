import { SubmissionOutcomeVO } from './submission-outcome.vo';

/**
 * Status Report Value Object
 * Subject and plain-text body of the email sent for an outcome
 */
export class StatusReportVO {
  static readonly SUBJECT = 'Submission Status';

  private constructor(
    private readonly _subject: string,
    private readonly _text: string,
  ) {}

  static fromOutcome(outcome: SubmissionOutcomeVO, signature: string): StatusReportVO {
    const closing = `Best regards,\n${signature}`;

    if (outcome.errorMessage !== undefined) {
      return new StatusReportVO(
        StatusReportVO.SUBJECT,
        `Hey,\n\nWe encountered an issue while processing your submission:\n\n${outcome.errorMessage}\n\n${closing}`,
      );
    }

    if (outcome.isEmpty()) {
      return new StatusReportVO(
        StatusReportVO.SUBJECT,
        `Hey,\n\nYour submission was empty and not processed.\n\n${closing}`,
      );
    }

    return new StatusReportVO(
      StatusReportVO.SUBJECT,
      `Hey,\n\nYour submission was ${outcome.fileSize} bytes and successfully uploaded to Google Cloud Storage.\n\n` +
        `GCP file path: ${outcome.destinationPath}\n\nThank you for your submission.\n\n${closing}`,
    );
  }

  get subject(): string {
    return this._subject;
  }

  get text(): string {
    return this._text;
  }
}
