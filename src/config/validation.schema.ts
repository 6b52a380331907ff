import { z } from 'zod';

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // SQS
  SQS_SUBMISSIONS_URL: z.string().url(),
  SQS_WAIT_TIME_SECONDS: z.coerce.number().min(0).max(20).default(20),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().min(0).max(43200).default(900),

  // DynamoDB
  DYNAMODB_TABLE_NAME: z.string().default('submission-audit'),
  AUDIT_RECORD_FORMAT: z.enum(['typed', 'legacy']).default('typed'),

  // Google Cloud Storage (XML API, HMAC keys)
  GCS_BUCKET_NAME: z.string().min(1),
  GCS_ENDPOINT: z.string().url().default('https://storage.googleapis.com'),
  GCS_HMAC_ACCESS_ID: z.string().min(1),
  GCS_HMAC_SECRET: z.string().min(1),

  // Mailgun
  MAILGUN_API_KEY: z.string().min(1),
  MAILGUN_DOMAIN: z.string().min(1),
  MAILGUN_API_URL: z.string().url().default('https://api.mailgun.net/v3'),
  EMAIL_SIGNATURE: z.string().default('Submission Service'),

  // Submission processing
  TEMP_DIR: z.string().default('/tmp/submissions'),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().min(0).default(0),
  UPLOAD_FAILURE_MODE: z.enum(['propagate', 'report']).default('propagate'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
