/**
 * Submission Event Value Object
 * One user-supplied archive, referenced by URL, and the address to report to
 */
export interface SubmissionEventProps {
  submissionUrl: string;
  userEmail: string;
}

export class SubmissionEventVO {
  private static readonly REQUIRED_EXTENSION = '.zip';
  private static readonly OBJECT_KEY_PREFIX = 'submissions/';

  private constructor(
    private readonly _submissionUrl: string,
    private readonly _userEmail: string,
  ) {}

  /**
   * Any strings are accepted; a blank or malformed URL is classified by
   * `hasZipExtension` and the fetch, not rejected here.
   */
  static create(props: SubmissionEventProps): SubmissionEventVO {
    return new SubmissionEventVO(props.submissionUrl, props.userEmail);
  }

  get submissionUrl(): string {
    return this._submissionUrl;
  }

  get userEmail(): string {
    return this._userEmail;
  }

  /**
   * Checked on the raw URL string, so a query string after `.zip` fails.
   */
  hasZipExtension(): boolean {
    return this._submissionUrl
      .toLowerCase()
      .endsWith(SubmissionEventVO.REQUIRED_EXTENSION);
  }

  /**
   * Object key the archive is stored under:
   * `submissions/{email}_{epochSeconds}_submission.zip`
   */
  objectKey(epochSeconds: number): string {
    return `${SubmissionEventVO.OBJECT_KEY_PREFIX}${this._userEmail}_${epochSeconds}_submission.zip`;
  }

  toJSON() {
    return {
      submissionUrl: this._submissionUrl,
      userEmail: this._userEmail,
    };
  }
}
