import { promises as fs } from 'fs';
import * as crypto from 'crypto';
import {
  FileStoragePort,
  UploadFileOptions,
  UploadResult,
} from '../../src/application/ports/output/file-storage.port';

interface StoredFile {
  buffer: Buffer;
  contentType?: string;
  metadata?: Record<string, string>;
  etag: string;
  uploadedAt: Date;
}

/**
 * In-Memory File Storage Adapter
 * Reads the uploaded file into memory instead of sending it to a bucket
 */
export class InMemoryFileStorageAdapter implements FileStoragePort {
  private storage: Map<string, Map<string, StoredFile>> = new Map();
  private uploadCount = 0;
  private nextError: Error | null = null;

  async uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult> {
    this.uploadCount++;

    if (this.nextError) {
      const error = this.nextError;
      this.nextError = null;
      throw error;
    }

    const buffer = await fs.readFile(filePath);
    const etag = `"${crypto.createHash('md5').update(buffer).digest('hex')}"`;

    let bucketStorage = this.storage.get(bucket);
    if (!bucketStorage) {
      bucketStorage = new Map();
      this.storage.set(bucket, bucketStorage);
    }

    bucketStorage.set(key, {
      buffer,
      contentType: options?.contentType,
      metadata: options?.metadata,
      etag,
      uploadedAt: new Date(),
    });

    return {
      key,
      bucket,
      etag,
      location: `gs://${bucket}/${key}`,
    };
  }

  // Test helper methods

  /**
   * Make the next upload reject with `error`
   */
  failNextUpload(error: Error): void {
    this.nextError = error;
  }

  getUploadCount(): number {
    return this.uploadCount;
  }

  getFile(bucket: string, key: string): StoredFile | undefined {
    return this.storage.get(bucket)?.get(key);
  }

  listKeys(bucket: string): string[] {
    return Array.from(this.storage.get(bucket)?.keys() ?? []);
  }

  clear(): void {
    this.storage.clear();
    this.uploadCount = 0;
    this.nextError = null;
  }
}
