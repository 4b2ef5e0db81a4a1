// Mock fs modules before any imports
jest.mock('fs', () => ({
  ...jest.requireActual('fs'),
  createReadStream: jest.fn(),
}));

jest.mock('fs/promises', () => ({
  stat: jest.fn(),
}));

// Mock AWS SDK
const mockSend = jest.fn();

jest.mock('@aws-sdk/client-s3', () => ({
  S3Client: jest.fn(() => ({ send: mockSend })),
  PutObjectCommand: jest.fn(),
  ListObjectsV2Command: jest.fn(),
  DeleteObjectCommand: jest.fn(),
  HeadBucketCommand: jest.fn(),
}));

import { Stats, createReadStream, ReadStream } from 'fs';
import { stat } from 'fs/promises';
import {
  S3Client as AWSS3Client,
  PutObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  HeadBucketCommand,
} from '@aws-sdk/client-s3';
import { S3Client } from '../src/clients/S3Client';
import { S3DestinationConfig } from '../src/interfaces/BackupConfig';
import { createMockLogger } from './helpers';

const mockCreateReadStream = jest.mocked(createReadStream);
const mockStat = jest.mocked(stat);

describe('S3Client', () => {
  let s3Client: S3Client;
  let config: S3DestinationConfig;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    jest.clearAllMocks();

    config = {
      bucket: 'test-bucket',
      prefix: 'backups',
      region: 'eu-west-1',
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    };
    logger = createMockLogger();

    s3Client = new S3Client(config, logger, { baseDelayMs: 1 });
  });

  describe('constructor', () => {
    it('should create S3Client with AWS credentials', () => {
      expect(AWSS3Client).toHaveBeenCalledWith({
        region: 'eu-west-1',
        credentials: {
          accessKeyId: 'test-access-key',
          secretAccessKey: 'test-secret',
        },
      });
    });

    it('should configure a path style endpoint for S3-compatible services', () => {
      new S3Client({ ...config, endpoint: 'http://localhost:9000' }, logger);

      expect(AWSS3Client).toHaveBeenLastCalledWith({
        region: 'eu-west-1',
        credentials: {
          accessKeyId: 'test-access-key',
          secretAccessKey: 'test-secret',
        },
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      });
    });
  });

  describe('uploadFile', () => {
    const fileStream = Object.create(ReadStream.prototype);

    beforeEach(() => {
      mockCreateReadStream.mockReturnValue(fileStream);
      mockStat.mockResolvedValue(Object.assign(new Stats(), { size: 1024 }));
      mockSend.mockResolvedValue({});
    });

    it('should upload file successfully', async () => {
      const result = await s3Client.uploadFile('/path/to/file.sql.gz', 'backups/app/file.sql.gz');

      expect(mockStat).toHaveBeenCalledWith('/path/to/file.sql.gz');
      expect(mockCreateReadStream).toHaveBeenCalledWith('/path/to/file.sql.gz');
      expect(mockSend).toHaveBeenCalledWith(expect.any(PutObjectCommand));
      expect(result).toBe('s3://test-bucket/backups/app/file.sql.gz');
    });

    it('should attach the checksum as object metadata', async () => {
      await s3Client.uploadFile('/path/to/file.sql.gz', 'backups/app/file.sql.gz', {
        checksum: 'abc123',
      });

      expect(PutObjectCommand).toHaveBeenCalledWith({
        Bucket: 'test-bucket',
        Key: 'backups/app/file.sql.gz',
        Body: fileStream,
        ContentLength: 1024,
        ContentType: 'application/gzip',
        Metadata: { sha256: 'abc123' },
      });
    });

    it('should retry on transient errors with a fresh stream', async () => {
      const transientError = new Error('Network error');
      mockSend
        .mockRejectedValueOnce(transientError)
        .mockRejectedValueOnce(transientError)
        .mockResolvedValueOnce({});

      const result = await s3Client.uploadFile('/path/to/file.sql.gz', 'backups/app/file.sql.gz');

      expect(mockSend).toHaveBeenCalledTimes(3);
      expect(mockCreateReadStream).toHaveBeenCalledTimes(3);
      expect(result).toBe('s3://test-bucket/backups/app/file.sql.gz');
    });

    it('should not retry on non-retryable errors', async () => {
      const authError = new Error('Invalid access key');
      authError.name = 'InvalidAccessKeyId';
      mockSend.mockRejectedValue(authError);

      await expect(
        s3Client.uploadFile('/path/to/file.sql.gz', 'backups/app/file.sql.gz')
      ).rejects.toThrow('Invalid access key');

      expect(mockSend).toHaveBeenCalledTimes(1);
    });

    it('should not retry on client errors reported through response metadata', async () => {
      const forbidden = Object.assign(new Error('Forbidden'), { $metadata: { httpStatusCode: 403 } });
      mockSend.mockRejectedValue(forbidden);

      await expect(
        s3Client.uploadFile('/path/to/file.sql.gz', 'backups/app/file.sql.gz')
      ).rejects.toThrow('Forbidden');

      expect(mockSend).toHaveBeenCalledTimes(1);
    });

    it('should fail after max retries', async () => {
      mockSend.mockRejectedValue(new Error('Network error'));

      await expect(
        s3Client.uploadFile('/path/to/file.sql.gz', 'backups/app/file.sql.gz')
      ).rejects.toThrow(
        'Failed to upload file /path/to/file.sql.gz to backups/app/file.sql.gz after 3 attempts. Last error: Network error'
      );

      expect(mockSend).toHaveBeenCalledTimes(3);
    });
  });

  describe('listObjects', () => {
    it('should list objects with prefix', async () => {
      mockSend.mockResolvedValue({
        Contents: [
          { Key: 'backups/app/a.sql.gz', LastModified: new Date('2024-01-01T10:00:00Z'), Size: 1024 },
          { Key: 'backups/app/b.sql.gz', LastModified: new Date('2024-01-02T10:00:00Z'), Size: 2048 },
        ],
      });

      const result = await s3Client.listObjects('backups/app/');

      expect(ListObjectsV2Command).toHaveBeenCalledWith({
        Bucket: 'test-bucket',
        Prefix: 'backups/app/',
        ContinuationToken: undefined,
      });
      expect(result).toEqual([
        { key: 'backups/app/a.sql.gz', lastModified: new Date('2024-01-01T10:00:00Z'), size: 1024 },
        { key: 'backups/app/b.sql.gz', lastModified: new Date('2024-01-02T10:00:00Z'), size: 2048 },
      ]);
    });

    it('should follow continuation tokens', async () => {
      mockSend
        .mockResolvedValueOnce({
          Contents: [{ Key: 'backups/app/a.sql.gz', LastModified: new Date('2024-01-01T10:00:00Z'), Size: 1 }],
          IsTruncated: true,
          NextContinuationToken: 'page-2',
        })
        .mockResolvedValueOnce({
          Contents: [{ Key: 'backups/app/b.sql.gz', LastModified: new Date('2024-01-02T10:00:00Z'), Size: 2 }],
          IsTruncated: false,
        });

      const result = await s3Client.listObjects('backups/app/');

      expect(ListObjectsV2Command).toHaveBeenLastCalledWith({
        Bucket: 'test-bucket',
        Prefix: 'backups/app/',
        ContinuationToken: 'page-2',
      });
      expect(result.map(object => object.key)).toEqual(['backups/app/a.sql.gz', 'backups/app/b.sql.gz']);
    });

    it('should return empty array when no objects found', async () => {
      mockSend.mockResolvedValue({ Contents: undefined });

      await expect(s3Client.listObjects('backups/app/')).resolves.toEqual([]);
    });

    it('should skip entries without a key and default missing sizes', async () => {
      mockSend.mockResolvedValue({
        Contents: [
          { LastModified: new Date('2024-01-01T10:00:00Z'), Size: 5 },
          { Key: 'backups/app/a.sql.gz', LastModified: new Date('2024-01-01T10:00:00Z') },
        ],
      });

      const result = await s3Client.listObjects('backups/app/');

      expect(result).toEqual([
        { key: 'backups/app/a.sql.gz', lastModified: new Date('2024-01-01T10:00:00Z'), size: 0 },
      ]);
    });
  });

  describe('deleteObject', () => {
    it('should delete object successfully', async () => {
      mockSend.mockResolvedValue({});

      await s3Client.deleteObject('backups/app/a.sql.gz');

      expect(DeleteObjectCommand).toHaveBeenCalledWith({
        Bucket: 'test-bucket',
        Key: 'backups/app/a.sql.gz',
      });
    });

    it('should retry on transient errors', async () => {
      mockSend.mockRejectedValueOnce(new Error('Network error')).mockResolvedValueOnce({});

      await s3Client.deleteObject('backups/app/a.sql.gz');

      expect(mockSend).toHaveBeenCalledTimes(2);
    });
  });

  describe('testConnection', () => {
    it('should return true when the bucket is reachable', async () => {
      mockSend.mockResolvedValue({});

      await expect(s3Client.testConnection()).resolves.toBe(true);
      expect(HeadBucketCommand).toHaveBeenCalledWith({ Bucket: 'test-bucket' });
    });

    it('should return false and log when the bucket is not reachable', async () => {
      mockSend.mockRejectedValue(new Error('NoSuchBucket'));

      await expect(s3Client.testConnection()).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith('S3 connection test failed', expect.any(Error), {
        bucket: 'test-bucket',
      });
    });
  });
});
