/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { FileStoragePort, UploadFileOptions, UploadResult } from './file-storage.port';
export type { AuditLogPort } from './audit-log.port';
export type { EmailSenderPort, EmailMessage, EmailDeliveryResult } from './email-sender.port';

// Injection tokens (string symbols for DI)
export const FILE_STORAGE_PORT = 'FileStoragePort';
export const AUDIT_LOG_PORT = 'AuditLogPort';
export const EMAIL_SENDER_PORT = 'EmailSenderPort';
