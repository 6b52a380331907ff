import { Module } from '@nestjs/common';
import { DynamoDbModule } from './dynamodb/dynamodb.module';

/**
 * AWS-side collaborators. The SQS trigger is wired separately through
 * @ssut/nestjs-sqs in AppModule.
 */
@Module({
  imports: [DynamoDbModule],
  exports: [DynamoDbModule],
})
export class AwsModule {}
