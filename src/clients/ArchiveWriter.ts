import { createHash } from 'crypto';
import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { v4 as uuidv4 } from 'uuid';
import { BackupTarget } from '../interfaces/BackupConfig';
import { ArchiveWriter as IArchiveWriter, Artifact } from '../interfaces/ArchiveWriter';
import { Logger } from '../interfaces/Logger';
import { ArchiveWriteError, errorCode, formatError, toError } from '../errors/BackupError';

export const ARTIFACT_EXTENSION = '.sql.gz';

const MAX_SEQUENCE = 99;
const ARTIFACT_NAME_PATTERN = /^(.+)_(\d{8}T\d{9}Z)_(\d{2})\.sql\.gz$/;

/**
 * Format date to YYYYMMDDTHHmmssSSSZ in UTC, fixed width so that names sort by time
 */
export function formatArtifactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export function buildArtifactName(targetId: string, timestamp: Date, sequence: number): string {
  return `${targetId}_${formatArtifactTimestamp(timestamp)}_${String(sequence).padStart(2, '0')}${ARTIFACT_EXTENSION}`;
}

/**
 * Parse an artifact file name back into its parts, null for anything else
 * found in a target directory (temporaries, foreign files)
 */
export function parseArtifactName(
  name: string
): { targetId: string; timestamp: Date; sequence: number } | null {
  const match = ARTIFACT_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }

  const [, targetId, stamp, sequence] = match;
  const iso =
    `${stamp.slice(0, 4)}-${stamp.slice(4, 6)}-${stamp.slice(6, 8)}` +
    `T${stamp.slice(9, 11)}:${stamp.slice(11, 13)}:${stamp.slice(13, 15)}.${stamp.slice(15, 18)}Z`;
  const timestamp = new Date(iso);

  if (isNaN(timestamp.getTime())) {
    return null;
  }

  return { targetId, timestamp, sequence: Number(sequence) };
}

export function isTemporaryArchiveName(name: string): boolean {
  return name.startsWith('.') && name.endsWith('.tmp');
}

/**
 * Compresses dumps into the target's directory. The archive is written under
 * a hidden temporary name and only then linked to its final name.
 */
export class ArchiveWriter implements IArchiveWriter {
  constructor(
    private destinationRoot: string,
    private logger: Logger
  ) {}

  targetDirectory(targetId: string): string {
    return path.join(this.destinationRoot, targetId);
  }

  async archive(
    dumpFilePath: string,
    target: BackupTarget,
    timestamp: Date,
    signal?: AbortSignal
  ): Promise<Artifact> {
    const directory = this.targetDirectory(target.id);
    const tempPath = path.join(directory, `.${target.id}.${uuidv4()}.tmp`);

    try {
      signal?.throwIfAborted();
      await fs.mkdir(directory, { recursive: true });

      // Opened before the temporary file exists, a missing dump leaves nothing behind
      const source = await fs.open(dumpFilePath, 'r');
      const hash = createHash('sha256');
      const gzip = createGzip({ level: 9 });
      gzip.on('data', (chunk: Buffer) => hash.update(chunk));

      await pipeline(
        source.createReadStream(),
        gzip,
        createWriteStream(tempPath),
        signal ? { signal } : {}
      );

      const checksum = hash.digest('hex');
      const name = await this.publish(tempPath, directory, target.id, timestamp);
      const finalPath = path.join(directory, name);
      const stats = await fs.stat(finalPath);

      this.logger.info(`Archive written: ${name}`, {
        targetId: target.id,
        path: finalPath,
        size: stats.size,
        checksum,
      });

      return {
        targetId: target.id,
        name,
        createdAt: timestamp,
        size: stats.size,
        path: finalPath,
        checksum,
      };
    } catch (error) {
      await this.removeTemporary(tempPath);
      throw new ArchiveWriteError(
        `Failed to archive dump for ${target.id}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  /**
   * Link the finished temporary file under the first free sequence number.
   * link() refuses to overwrite, so two writers can never share a name.
   */
  private async publish(
    tempPath: string,
    directory: string,
    targetId: string,
    timestamp: Date
  ): Promise<string> {
    for (let sequence = 0; sequence <= MAX_SEQUENCE; sequence++) {
      const name = buildArtifactName(targetId, timestamp, sequence);
      try {
        await fs.link(tempPath, path.join(directory, name));
        await this.removeTemporary(tempPath);
        return name;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw error;
        }
      }
    }

    throw new Error(`No free artifact name for ${targetId} at ${timestamp.toISOString()}`);
  }

  private async removeTemporary(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Failed to remove temporary archive ${tempPath}`, { error: formatError(error) });
      }
    }
  }
}
