import { BackupTarget } from './BackupConfig';

/**
 * A packaged, retained backup file
 */
export interface Artifact {
  targetId: string;

  /** File name, also the artifact identifier within its target */
  name: string;

  createdAt: Date;

  /** Size of the compressed file in bytes */
  size: number;

  /** Absolute local path */
  path: string;

  /** sha256 of the compressed file, hex */
  checksum: string;

  /** Remote copy, e.g. s3://bucket/prefix/target/name */
  remoteLocation?: string;
}

export interface ArchiveWriter {
  /** Compress a dump file into a uniquely named artifact, atomically */
  archive(
    dumpFilePath: string,
    target: BackupTarget,
    timestamp: Date,
    signal?: AbortSignal
  ): Promise<Artifact>;
}
