import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { createReadStream, promises as fs } from 'fs';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../logging/pino-logger.service';

export interface GcsUploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface GcsUploadResult {
  bucket: string;
  key: string;
  etag: string;
  size: number;
  /** Fully qualified object path, `gs://{bucket}/{key}` */
  location: string;
}

/**
 * Google Cloud Storage access through its S3-compatible XML API.
 *
 * The client is created on first use and then shared by every event the
 * process handles.
 */
@Injectable()
export class GcsService implements OnModuleDestroy {
  private client: S3Client | null = null;
  private readonly gcsConfig: AppConfig['gcs'];
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    this.gcsConfig = this.configService.get('gcs', { infer: true });
    this.logger = logger.forContext(GcsService.name);
  }

  get bucketName(): string {
    return this.gcsConfig.bucketName;
  }

  async uploadFile(
    key: string,
    filePath: string,
    options?: GcsUploadOptions,
  ): Promise<GcsUploadResult> {
    const stats = await fs.stat(filePath);
    const fileStream = createReadStream(filePath);

    const upload = new Upload({
      client: this.getClient(),
      params: {
        Bucket: this.gcsConfig.bucketName,
        Key: key,
        Body: fileStream,
        ContentType: options?.contentType,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { key, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    const result = await upload.done();
    const location = GcsService.toGsPath(this.gcsConfig.bucketName, key);

    this.logger.info({ location, size: stats.size }, 'File uploaded successfully');

    return {
      bucket: this.gcsConfig.bucketName,
      key,
      etag: result.ETag || '',
      size: stats.size,
      location,
    };
  }

  static toGsPath(bucket: string, key: string): string {
    return `gs://${bucket}/${key}`;
  }

  private getClient(): S3Client {
    if (!this.client) {
      this.client = new S3Client({
        region: 'auto',
        endpoint: this.gcsConfig.endpoint,
        forcePathStyle: true,
        credentials: {
          accessKeyId: this.gcsConfig.hmacAccessId,
          secretAccessKey: this.gcsConfig.hmacSecret,
        },
        // The XML API rejects the flexible checksum headers newer SDKs send by default
        requestChecksumCalculation: 'WHEN_REQUIRED',
        responseChecksumValidation: 'WHEN_REQUIRED',
      });
      this.logger.debug({ endpoint: this.gcsConfig.endpoint }, 'Storage client created');
    }
    return this.client;
  }

  onModuleDestroy() {
    this.client?.destroy();
    this.client = null;
  }
}
