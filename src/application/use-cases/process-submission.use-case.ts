import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig, UploadFailureMode } from '../../config/configuration';
import { HttpClientService, StreamResponse } from '../../shared/http/http-client.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { SubmissionEventVO } from '../../domain/value-objects/submission-event.vo';
import { SubmissionOutcomeVO } from '../../domain/value-objects/submission-outcome.vo';
import { ProcessSubmissionCommand, ProcessSubmissionPort } from '../ports/input/process-submission.port';
import { FILE_STORAGE_PORT } from '../ports/output';
import type { FileStoragePort } from '../ports/output';
import { SubmissionNotifierService } from '../services/submission-notifier.service';
import { SubmissionAuditorService } from '../services/submission-auditor.service';

/**
 * Process Submission Use Case
 * Download → validate → upload, then report the outcome by email and audit
 * record. Each check short-circuits to its own outcome.
 */
@Injectable()
export class ProcessSubmissionUseCase implements ProcessSubmissionPort {
  static readonly CHUNK_SIZE = 8192;

  private readonly logger: PinoLoggerService;
  private readonly bucketName: string;
  private readonly tempDir: string;
  private readonly downloadTimeoutMs: number;
  private readonly uploadFailureMode: UploadFailureMode;

  constructor(
    @Inject(FILE_STORAGE_PORT) private readonly fileStorage: FileStoragePort,
    private readonly httpClient: HttpClientService,
    private readonly notifier: SubmissionNotifierService,
    private readonly auditor: SubmissionAuditorService,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    const submissionConfig = configService.get('submission', { infer: true });

    this.bucketName = configService.get('gcs.bucketName', { infer: true });
    this.tempDir = submissionConfig.tempDir;
    this.downloadTimeoutMs = submissionConfig.downloadTimeoutMs;
    this.uploadFailureMode = submissionConfig.uploadFailureMode;
    this.logger = logger.forContext(ProcessSubmissionUseCase.name);
  }

  async execute(command: ProcessSubmissionCommand): Promise<SubmissionOutcomeVO> {
    const startTime = Date.now();
    const submissionId = uuidv4();
    const log = this.logger.withSubmissionId(submissionId);

    try {
      const event = SubmissionEventVO.create(command);
      log.info({ submissionUrl: event.submissionUrl }, 'Processing submission');

      const outcome = await this.resolveOutcome(event, submissionId, log);

      await this.notifier.notify(outcome, event.userEmail);
      await this.auditor.record(outcome, event);

      log.info(
        { ...outcome.toJSON(), processingDurationMs: Date.now() - startTime },
        'Submission processed',
      );
      return outcome;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.error(
        { error: err.message, stack: err.stack, processingDurationMs: Date.now() - startTime },
        'Unhandled error while processing submission',
      );
      throw error;
    }
  }

  private async resolveOutcome(
    event: SubmissionEventVO,
    submissionId: string,
    log: PinoLoggerService,
  ): Promise<SubmissionOutcomeVO> {
    if (!event.hasZipExtension()) {
      log.warn({ submissionUrl: event.submissionUrl }, 'Rejected submission without .zip extension');
      return SubmissionOutcomeVO.invalidFormat();
    }

    const scratchPath = join(this.tempDir, `${submissionId}.zip`);

    try {
      const fileSize = await this.downloadToScratch(event.submissionUrl, scratchPath, log);

      if (fileSize === null) {
        return SubmissionOutcomeVO.fetchFailed();
      }

      if (fileSize === 0) {
        log.warn('Downloaded submission is empty, skipping upload');
        return SubmissionOutcomeVO.empty();
      }

      return await this.upload(event, submissionId, scratchPath, fileSize, log);
    } finally {
      await this.removeScratchFile(scratchPath, log);
    }
  }

  /**
   * @returns byte size of the scratch file, or null when the fetch failed
   */
  private async downloadToScratch(
    url: string,
    scratchPath: string,
    log: PinoLoggerService,
  ): Promise<number | null> {
    let response: StreamResponse;

    try {
      response = await this.httpClient.downloadToStream(url, {
        timeout: this.downloadTimeoutMs,
      });
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Download request failed',
      );
      return null;
    }

    if (response.statusCode !== 200) {
      // Destroying an unread undici body emits an abort error
      response.body.once('error', (error) => {
        log.debug({ error: error.message }, 'Discarded download body');
      });
      response.body.destroy();
      log.warn({ statusCode: response.statusCode }, 'Download returned non-OK status');
      return null;
    }

    await fs.mkdir(this.tempDir, { recursive: true });

    try {
      await pipeline(
        response.body,
        this.createChunkingStream(ProcessSubmissionUseCase.CHUNK_SIZE),
        createWriteStream(scratchPath, { highWaterMark: ProcessSubmissionUseCase.CHUNK_SIZE }),
      );
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Download stream failed',
      );
      return null;
    }

    const stats = await fs.stat(scratchPath);
    log.debug({ fileSize: stats.size }, 'Submission downloaded');
    return stats.size;
  }

  private async upload(
    event: SubmissionEventVO,
    submissionId: string,
    scratchPath: string,
    fileSize: number,
    log: PinoLoggerService,
  ): Promise<SubmissionOutcomeVO> {
    const key = event.objectKey(Math.floor(Date.now() / 1000));

    try {
      const result = await this.fileStorage.uploadFile(this.bucketName, key, scratchPath, {
        contentType: 'application/zip',
        metadata: { submissionId },
      });

      return SubmissionOutcomeVO.success(fileSize, result.location);
    } catch (error) {
      if (this.uploadFailureMode === 'report') {
        log.error(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Upload failed, reporting to user',
        );
        return SubmissionOutcomeVO.uploadFailed(fileSize);
      }
      throw error;
    }
  }

  private async removeScratchFile(scratchPath: string, log: PinoLoggerService): Promise<void> {
    try {
      await fs.rm(scratchPath, { force: true });
    } catch (error) {
      log.warn(
        { scratchPath, error: error instanceof Error ? error.message : String(error) },
        'Failed to remove scratch file',
      );
    }
  }

  /**
   * Re-slices incoming chunks so no write exceeds `maxChunkSize` bytes
   */
  private createChunkingStream(maxChunkSize: number): Transform {
    return new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        for (let offset = 0; offset < chunk.length; offset += maxChunkSize) {
          this.push(chunk.subarray(offset, offset + maxChunkSize));
        }
        callback();
      },
    });
  }
}
