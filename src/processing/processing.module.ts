import { Module } from '@nestjs/common';
import { LoggingModule } from '../shared/logging/logging.module';
import { ApplicationModule } from '../application/application.module';
import { SubmissionConsumer } from './consumers/submission.consumer';

@Module({
  imports: [LoggingModule, ApplicationModule],
  providers: [SubmissionConsumer],
})
export class ProcessingModule {}
