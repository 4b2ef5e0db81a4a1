import { promises as fs } from 'fs';
import * as path from 'path';
import { Artifact } from '../interfaces/ArchiveWriter';
import { LocalStore, RemoteStore, StoredArtifact } from '../interfaces/ArtifactStore';
import { Logger } from '../interfaces/Logger';
import { S3Client } from '../interfaces/S3Client';
import { UploadError, errorCode, formatError, toError } from '../errors/BackupError';
import { isTemporaryArchiveName, parseArtifactName } from './ArchiveWriter';

function newestFirst(a: StoredArtifact, b: StoredArtifact): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? 1 : -1;
}

/**
 * Artifacts on the local filesystem, one directory per target
 */
export class LocalArtifactStore implements LocalStore {
  readonly location: string;

  constructor(
    private root: string,
    private logger: Logger
  ) {
    this.location = `file://${root}`;
  }

  async list(targetId: string): Promise<StoredArtifact[]> {
    const directory = path.join(this.root, targetId);
    let entries: string[];

    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const artifacts: StoredArtifact[] = [];
    for (const name of entries) {
      const parsed = parseArtifactName(name);
      if (!parsed || parsed.targetId !== targetId) {
        continue;
      }

      try {
        const stats = await fs.stat(path.join(directory, name));
        artifacts.push({ name, timestamp: parsed.timestamp, size: stats.size });
      } catch (error) {
        // Removed between readdir and stat
        if (errorCode(error) !== 'ENOENT') {
          throw error;
        }
      }
    }

    return artifacts.sort(newestFirst);
  }

  async delete(targetId: string, name: string): Promise<void> {
    await fs.unlink(path.join(this.root, targetId, name));
  }

  /**
   * Remove half-written archives left in a target directory by a killed process
   */
  async removeStaleTemporaries(targetId: string): Promise<string[]> {
    const directory = path.join(this.root, targetId);
    let entries: string[];

    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const removed: string[] = [];
    for (const name of entries.filter(isTemporaryArchiveName)) {
      try {
        await fs.unlink(path.join(directory, name));
        removed.push(name);
      } catch (error) {
        this.logger.warn(`Failed to remove stale temporary archive ${name}`, {
          targetId,
          error: formatError(error),
        });
      }
    }

    return removed;
  }
}

/**
 * Offsite artifacts in S3, keyed <prefix>/<targetId>/<name>
 */
export class S3ArtifactStore implements RemoteStore {
  readonly location: string;

  constructor(
    private s3Client: S3Client,
    private bucket: string,
    private prefix: string
  ) {
    this.location = `s3://${bucket}/${prefix}`;
  }

  keyFor(targetId: string, name: string): string {
    return `${this.targetPrefix(targetId)}${name}`;
  }

  async upload(artifact: Artifact): Promise<string> {
    const key = this.keyFor(artifact.targetId, artifact.name);
    try {
      return await this.s3Client.uploadFile(artifact.path, key, {
        checksum: artifact.checksum,
        contentType: 'application/gzip',
      });
    } catch (error) {
      throw new UploadError(
        `Failed to upload ${artifact.name} to s3://${this.bucket}/${key}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async list(targetId: string): Promise<StoredArtifact[]> {
    const prefix = this.targetPrefix(targetId);
    const objects = await this.s3Client.listObjects(prefix);
    const artifacts: StoredArtifact[] = [];

    for (const object of objects) {
      const name = object.key.slice(prefix.length);
      const parsed = parseArtifactName(name);
      if (name.includes('/') || !parsed || parsed.targetId !== targetId) {
        continue;
      }
      artifacts.push({ name, timestamp: parsed.timestamp, size: object.size });
    }

    return artifacts.sort(newestFirst);
  }

  async delete(targetId: string, name: string): Promise<void> {
    await this.s3Client.deleteObject(this.keyFor(targetId, name));
  }

  private targetPrefix(targetId: string): string {
    return this.prefix ? `${this.prefix}/${targetId}/` : `${targetId}/`;
  }
}
