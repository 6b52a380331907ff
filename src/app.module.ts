import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SqsModule } from '@ssut/nestjs-sqs';
import { SQSClient } from '@aws-sdk/client-sqs';
import { AppConfig } from './config/configuration';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ProcessingModule } from './processing/processing.module';
import { SUBMISSIONS_QUEUE } from './processing/consumers/submission.consumer';

/**
 * Application Module
 * SQS-triggered relay: one submission event per message
 * Uses @ssut/nestjs-sqs for consuming messages
 */
@Module({
  imports: [
    ConfigModule,
    SharedModule,

    SqsModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const awsConfig = configService.get('aws', { infer: true });
        const sqsConfig = configService.get('sqs', { infer: true });

        // Create SQS client with LocalStack support
        const sqsClient = new SQSClient({
          region: awsConfig.region,
          ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
          ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
        });

        return {
          consumers: [
            {
              name: SUBMISSIONS_QUEUE,
              queueUrl: sqsConfig.submissionsUrl,
              region: awsConfig.region,
              sqs: sqsClient,
              // Submissions are handled one at a time
              batchSize: 1,
              waitTimeSeconds: sqsConfig.waitTimeSeconds,
              visibilityTimeout: sqsConfig.visibilityTimeout,
            },
          ],
          producers: [],
        };
      },
    }),

    ProcessingModule,
  ],
})
export class AppModule {}
