import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DynamoDbAuditLogAdapter } from '../../../src/infrastructure/adapters/persistence/dynamodb-audit-log.adapter';
import { DynamoDbService } from '../../../src/shared/aws/dynamodb/dynamodb.service';
import { AuditRecordEntity } from '../../../src/domain/entities/audit-record.entity';
import { SubmissionEventVO } from '../../../src/domain/value-objects/submission-event.vo';
import { SubmissionOutcomeVO } from '../../../src/domain/value-objects/submission-outcome.vo';
import { AuditRecordFormat } from '../../../src/config/configuration';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import {
  createConfigService,
  createTestConfig,
  createTestLogger,
} from '../helpers/mock-factories';

describe('DynamoDbAuditLogAdapter', () => {
  let dynamoDb: DynamoDbService;
  let logger: PinoLoggerService;

  const event = SubmissionEventVO.create({
    submissionUrl: 'https://files.example.com/a.zip',
    userEmail: 'user@example.com',
  });

  const createRecord = (outcome: SubmissionOutcomeVO) =>
    AuditRecordEntity.create({ id: 'audit-123', event, outcome, timestamp: 1767225600 });

  const createAdapter = (recordFormat: AuditRecordFormat = 'typed') =>
    new DynamoDbAuditLogAdapter(
      dynamoDb,
      createConfigService(createTestConfig({ dynamodb: { recordFormat } })),
      logger,
    );

  beforeEach(() => {
    logger = createTestLogger();
    dynamoDb = new DynamoDbService(createConfigService(), logger);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    dynamoDb.onModuleDestroy();
  });

  describe('append', () => {
    it('should put the item without overwriting an existing id', async () => {
      // Arrange
      const putSpy = vi.spyOn(dynamoDb, 'putItem').mockResolvedValue(undefined);
      const logSpy = vi.spyOn(logger, 'log');
      const adapter = createAdapter();

      // Act
      await adapter.append(createRecord(SubmissionOutcomeVO.success(1024, 'gs://test-bucket/k.zip')));

      // Assert
      expect(putSpy).toHaveBeenCalledWith(
        {
          id: 'audit-123',
          userEmail: 'user@example.com',
          submissionUrl: 'https://files.example.com/a.zip',
          downloadStatus: 'Success',
          emailSent: true,
          successPath: 'gs://test-bucket/k.zip',
          Timestamp: 1767225600,
        },
        { conditionExpression: 'attribute_not_exists(id)' },
      );
      expect(logSpy).toHaveBeenCalledWith('Saved audit record audit-123 to DynamoDB');
    });

    it('should propagate DynamoDB errors', async () => {
      vi.spyOn(dynamoDb, 'putItem').mockRejectedValue(
        new Error('ConditionalCheckFailedException'),
      );
      const adapter = createAdapter();

      await expect(adapter.append(createRecord(SubmissionOutcomeVO.empty()))).rejects.toThrow(
        'ConditionalCheckFailedException',
      );
    });
  });

  describe('toItem', () => {
    it('should write the email flag as a boolean in typed format', () => {
      const item = createAdapter('typed').toItem(createRecord(SubmissionOutcomeVO.fetchFailed()));

      expect(item.emailSent).toBe(false);
      expect(item.downloadStatus).toBe('No Content');
      expect(item.successPath).toBe('N/A');
    });

    it('should write the email flag as Yes/No in legacy format', () => {
      const adapter = createAdapter('legacy');

      expect(adapter.toItem(createRecord(SubmissionOutcomeVO.empty())).emailSent).toBe('Yes');
      expect(adapter.toItem(createRecord(SubmissionOutcomeVO.invalidFormat())).emailSent).toBe(
        'No',
      );
    });

    it('should keep the timestamp numeric in both formats', () => {
      const record = createRecord(SubmissionOutcomeVO.empty());

      expect(createAdapter('typed').toItem(record).Timestamp).toBe(1767225600);
      expect(createAdapter('legacy').toItem(record).Timestamp).toBe(1767225600);
    });
  });
});
