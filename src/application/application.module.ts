import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { PROCESS_SUBMISSION_PORT } from './ports/input';
import { ProcessSubmissionUseCase } from './use-cases';
import { SubmissionAuditorService, SubmissionNotifierService } from './services';

/**
 * Application Module
 * Contains the use case and the notifier/auditor collaborators it reports through
 *
 * Depends on output ports (interfaces); their implementations come from
 * InfrastructureModule.
 */
@Module({
  imports: [ConfigModule, LoggingModule, HttpModule, InfrastructureModule],
  providers: [
    SubmissionNotifierService,
    SubmissionAuditorService,
    ProcessSubmissionUseCase,
    {
      provide: PROCESS_SUBMISSION_PORT,
      useExisting: ProcessSubmissionUseCase,
    },
  ],
  exports: [PROCESS_SUBMISSION_PORT],
})
export class ApplicationModule {}
