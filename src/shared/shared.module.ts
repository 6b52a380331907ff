import { Module } from '@nestjs/common';
import { AwsModule } from './aws/aws.module';
import { GcsModule } from './gcs/gcs.module';
import { HttpModule } from './http/http.module';
import { LoggingModule } from './logging/logging.module';

@Module({
  imports: [AwsModule, GcsModule, HttpModule, LoggingModule],
  exports: [AwsModule, GcsModule, HttpModule, LoggingModule],
})
export class SharedModule {}
