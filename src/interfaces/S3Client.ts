/**
 * Represents an S3 object with metadata
 */
export interface S3Object {
  key: string;
  lastModified: Date;
  size: number;
}

export interface UploadOptions {
  /** sha256 of the file, stored as object metadata */
  checksum?: string;
  contentType?: string;
}

/**
 * Offsite copy of artifacts on S3-compatible storage
 */
export interface S3Client {
  /** Upload a file, resolves to its s3:// location */
  uploadFile(filePath: string, key: string, options?: UploadOptions): Promise<string>;

  /** All objects under a prefix, following continuation tokens */
  listObjects(prefix: string): Promise<S3Object[]>;

  deleteObject(key: string): Promise<void>;

  /** HEAD the bucket to check credentials and reachability */
  testConnection(): Promise<boolean>;
}
