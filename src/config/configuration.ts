/**
 * Application Configuration Module
 *
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the submission relay.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig, true>) {}
 *
 * const bucket = this.configService.get('gcs.bucketName', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type AuditRecordFormat = EnvConfig['AUDIT_RECORD_FORMAT'];
export type UploadFailureMode = EnvConfig['UPLOAD_FAILURE_MODE'];

/**
 * Application configuration interface.
 *
 * Organized by collaborator (aws, sqs, gcs, mailgun, ...) so each adapter
 * reads only its own section.
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    submissionsUrl: string;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
  dynamodb: {
    tableName: string;
    recordFormat: AuditRecordFormat;
  };
  /**
   * Destination bucket. Uploads go through the Cloud Storage XML API with
   * an HMAC key pair, so the S3 client of the AWS SDK is used against
   * `endpoint`.
   */
  gcs: {
    bucketName: string;
    endpoint: string;
    hmacAccessId: string;
    hmacSecret: string;
  };
  mailgun: {
    apiKey: string;
    domain: string;
    apiUrl: string;
    signature: string;
  };
  /**
   * Submission processing.
   *
   * ### tempDir (Environment: TEMP_DIR)
   * - Scratch directory for downloaded archives, one UUID-named file per event
   * - Files are removed once the event has been handled
   *
   * ### downloadTimeoutMs (Environment: DOWNLOAD_TIMEOUT_MS)
   * - Header and body timeout of the download; `0` leaves the bound to the host
   *
   * ### uploadFailureMode (Environment: UPLOAD_FAILURE_MODE)
   * - `propagate`: a failed upload is re-thrown, no email and no audit record
   * - `report`: a failed upload is emailed and audited as UPLOAD_FAILED
   */
  submission: {
    tempDir: string;
    downloadTimeoutMs: number;
    uploadFailureMode: UploadFailureMode;
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      submissionsUrl: env.SQS_SUBMISSIONS_URL,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
      recordFormat: env.AUDIT_RECORD_FORMAT,
    },
    gcs: {
      bucketName: env.GCS_BUCKET_NAME,
      endpoint: env.GCS_ENDPOINT,
      hmacAccessId: env.GCS_HMAC_ACCESS_ID,
      hmacSecret: env.GCS_HMAC_SECRET,
    },
    mailgun: {
      apiKey: env.MAILGUN_API_KEY,
      domain: env.MAILGUN_DOMAIN,
      apiUrl: env.MAILGUN_API_URL,
      signature: env.EMAIL_SIGNATURE,
    },
    submission: {
      tempDir: env.TEMP_DIR,
      downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS,
      uploadFailureMode: env.UPLOAD_FAILURE_MODE,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
