import type { AuditRecordEntity } from '../../../domain/entities/audit-record.entity';

/**
 * Audit Log Port (Driven Port)
 * Append-only store of handled submissions
 */
export interface AuditLogPort {
  /**
   * Persist a new record. Never overwrites an existing record with the same id.
   */
  append(record: AuditRecordEntity): Promise<void>;
}
