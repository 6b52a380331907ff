import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';
import { GcsModule } from '../shared/gcs/gcs.module';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';
import {
  AUDIT_LOG_PORT,
  EMAIL_SENDER_PORT,
  FILE_STORAGE_PORT,
} from '../application/ports/output';

// Adapters (implementations)
import { DynamoDbAuditLogAdapter } from './adapters/persistence/dynamodb-audit-log.adapter';
import { GcsFileStorageAdapter } from './adapters/storage/gcs-file-storage.adapter';
import { MailgunEmailAdapter } from './adapters/email/mailgun-email.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 */
@Module({
  imports: [ConfigModule, LoggingModule, HttpModule, GcsModule, DynamoDbModule],
  providers: [
    // Storage adapters
    GcsFileStorageAdapter,
    {
      provide: FILE_STORAGE_PORT,
      useExisting: GcsFileStorageAdapter,
    },

    // Persistence adapters
    DynamoDbAuditLogAdapter,
    {
      provide: AUDIT_LOG_PORT,
      useExisting: DynamoDbAuditLogAdapter,
    },

    // Email adapters
    MailgunEmailAdapter,
    {
      provide: EMAIL_SENDER_PORT,
      useExisting: MailgunEmailAdapter,
    },
  ],
  exports: [FILE_STORAGE_PORT, AUDIT_LOG_PORT, EMAIL_SENDER_PORT],
})
export class InfrastructureModule {}
