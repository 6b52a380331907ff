import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig, AuditRecordFormat } from '../../../config/configuration';
import { AuditLogPort } from '../../../application/ports/output/audit-log.port';
import { AuditRecordEntity } from '../../../domain/entities/audit-record.entity';
import { DynamoDbService } from '../../../shared/aws/dynamodb/dynamodb.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Audit item as stored in DynamoDB. Attribute names are shared with
 * existing readers of the table.
 */
export type AuditItem = {
  id: string;
  userEmail: string;
  submissionUrl: string;
  downloadStatus: string;
  emailSent: boolean | 'Yes' | 'No';
  successPath: string;
  Timestamp: number;
};

/**
 * DynamoDB Audit Log Adapter
 * Implements AuditLogPort using DynamoDB
 */
@Injectable()
export class DynamoDbAuditLogAdapter implements AuditLogPort {
  private readonly logger: PinoLoggerService;
  private readonly recordFormat: AuditRecordFormat;

  constructor(
    private readonly dynamoDb: DynamoDbService,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    this.recordFormat = configService.get('dynamodb.recordFormat', { infer: true });
    this.logger = logger.forContext(DynamoDbAuditLogAdapter.name);
  }

  async append(record: AuditRecordEntity): Promise<void> {
    await this.dynamoDb.putItem(this.toItem(record), {
      conditionExpression: 'attribute_not_exists(id)',
    });

    this.logger.log(`Saved audit record ${record.id} to DynamoDB`);
  }

  /**
   * Convert domain entity to a DynamoDB item
   */
  toItem(record: AuditRecordEntity): AuditItem {
    return {
      id: record.id,
      userEmail: record.userEmail,
      submissionUrl: record.submissionUrl,
      downloadStatus: record.downloadStatus,
      emailSent: this.recordFormat === 'legacy' ? (record.emailSent ? 'Yes' : 'No') : record.emailSent,
      successPath: record.destinationPath,
      Timestamp: record.timestamp,
    };
  }
}
