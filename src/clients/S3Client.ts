import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  HeadBucketCommand,
  PutObjectCommandInput,
} from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { S3DestinationConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client as IS3Client, S3Object, UploadOptions } from '../interfaces/S3Client';
import { formatError, toError } from '../errors/BackupError';

const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
];

export interface S3ClientOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

/**
 * S3Client implementation using AWS SDK v3
 * Provides file upload, listing, and deletion capabilities with retry logic
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private maxRetries: number;
  private baseDelay: number;

  constructor(
    config: S3DestinationConfig,
    private logger: Logger,
    options: S3ClientOptions = {}
  ) {
    const clientConfig: S3ClientConfig = {
      region: config.region,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    };

    // Use custom endpoint if provided (for S3-compatible services)
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
      clientConfig.forcePathStyle = true; // Required for MinIO, R2 and other S3-compatible services
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = config.bucket;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelay = options.baseDelayMs ?? 1000;
  }

  async uploadFile(filePath: string, key: string, options: UploadOptions = {}): Promise<string> {
    return this.withRetry(async () => {
      // A fresh stream per attempt, a consumed one cannot be re-sent
      const fileStats = await stat(filePath);

      const uploadParams: PutObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(filePath),
        ContentLength: fileStats.size,
        ContentType: options.contentType ?? 'application/gzip',
      };

      if (options.checksum) {
        uploadParams.Metadata = { sha256: options.checksum };
      }

      await this.client.send(new PutObjectCommand(uploadParams));
      return `s3://${this.bucket}/${key}`;
    }, `upload file ${filePath} to ${key}`);
  }

  async listObjects(prefix: string): Promise<S3Object[]> {
    return this.withRetry(async () => {
      const objects: S3Object[] = [];
      let continuationToken: string | undefined;

      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );

        for (const obj of response.Contents ?? []) {
          if (!obj.Key) continue;
          objects.push({
            key: obj.Key,
            lastModified: obj.LastModified ?? new Date(0),
            size: obj.Size ?? 0,
          });
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);

      return objects;
    }, `list objects with prefix ${prefix}`);
  }

  async deleteObject(key: string): Promise<void> {
    await this.withRetry(async () => {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    }, `delete object ${key}`);
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error('S3 connection test failed', toError(error), { bucket: this.bucket });
      return false;
    }
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    let lastError: Error = new Error(`Failed to ${operationName}`);

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = toError(error);

        // Don't retry on certain error types
        if (this.isNonRetryableError(error)) {
          throw lastError;
        }

        if (attempt === this.maxRetries) {
          break;
        }

        const delay = this.baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Attempt ${attempt} failed for ${operationName}: ${formatError(lastError)}. Retrying in ${delay}ms...`
        );

        await this.sleep(delay);
      }
    }

    throw new Error(
      `Failed to ${operationName} after ${this.maxRetries} attempts. Last error: ${lastError.message}`
    );
  }

  /**
   * Authentication, permission and addressing errors will not heal on retry
   */
  private isNonRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }

    const name = 'name' in error && typeof error.name === 'string' ? error.name : undefined;
    const code = 'Code' in error && typeof error.Code === 'string' ? error.Code : undefined;
    const status =
      '$metadata' in error &&
      typeof error.$metadata === 'object' &&
      error.$metadata !== null &&
      'httpStatusCode' in error.$metadata &&
      typeof error.$metadata.httpStatusCode === 'number'
        ? error.$metadata.httpStatusCode
        : undefined;

    return (
      (name !== undefined && NON_RETRYABLE_CODES.includes(name)) ||
      (code !== undefined && NON_RETRYABLE_CODES.includes(code)) ||
      (status !== undefined && status >= 400 && status < 500)
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
