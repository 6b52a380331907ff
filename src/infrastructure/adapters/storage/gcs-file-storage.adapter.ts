import { Injectable } from '@nestjs/common';
import {
  FileStoragePort,
  UploadFileOptions,
  UploadResult,
} from '../../../application/ports/output/file-storage.port';
import { GcsService } from '../../../shared/gcs/gcs.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * GCS File Storage Adapter
 * Implements FileStoragePort using Google Cloud Storage
 */
@Injectable()
export class GcsFileStorageAdapter implements FileStoragePort {
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly gcsService: GcsService,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(GcsFileStorageAdapter.name);
  }

  async uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult> {
    if (bucket !== this.gcsService.bucketName) {
      throw new Error(
        `Bucket ${bucket} is not the configured bucket ${this.gcsService.bucketName}`,
      );
    }

    this.logger.debug(`Uploading file to GCS: ${bucket}/${key} from ${filePath}`);

    const result = await this.gcsService.uploadFile(key, filePath, {
      contentType: options?.contentType,
      metadata: options?.metadata,
    });

    return {
      key: result.key,
      bucket: result.bucket,
      etag: result.etag,
      location: result.location,
    };
  }
}
