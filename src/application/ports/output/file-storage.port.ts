/**
 * Upload File Options
 */
export interface UploadFileOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

/**
 * Upload Result
 */
export interface UploadResult {
  key: string;
  bucket: string;
  etag: string;
  /** Fully qualified object path, e.g. `gs://bucket/key` */
  location: string;
}

/**
 * File Storage Port (Driven Port)
 * Write-only access to the destination bucket
 */
export interface FileStoragePort {
  /**
   * Upload a file from a local path
   */
  uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult>;
}
