import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { AuditRecordEntity } from '../../domain/entities/audit-record.entity';
import { SubmissionEventVO } from '../../domain/value-objects/submission-event.vo';
import { SubmissionOutcomeVO } from '../../domain/value-objects/submission-outcome.vo';
import { AUDIT_LOG_PORT } from '../ports/output';
import type { AuditLogPort } from '../ports/output';

/**
 * Submission Auditor
 * Appends one audit record per handled submission. Write failures are logged
 * and never mask the outcome already reported to the user.
 */
@Injectable()
export class SubmissionAuditorService {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(AUDIT_LOG_PORT) private readonly auditLog: AuditLogPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(SubmissionAuditorService.name);
  }

  /**
   * @returns the stored record, or null when the write failed
   */
  async record(
    outcome: SubmissionOutcomeVO,
    event: SubmissionEventVO,
  ): Promise<AuditRecordEntity | null> {
    try {
      const record = AuditRecordEntity.create({
        id: uuidv4(),
        event,
        outcome,
        timestamp: Math.floor(Date.now() / 1000),
      });

      await this.auditLog.append(record);

      this.logger.debug(
        { auditId: record.id, downloadStatus: record.downloadStatus },
        'Audit record written',
      );
      return record;
    } catch (error) {
      this.logger.error(
        {
          status: outcome.status,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to write audit record',
      );
      return null;
    }
  }
}
