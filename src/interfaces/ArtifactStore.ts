import { Artifact } from './ArchiveWriter';

/**
 * An artifact as seen in a store listing
 */
export interface StoredArtifact {
  name: string;

  /** Timestamp encoded in the artifact name */
  timestamp: Date;

  size: number;
}

/**
 * A place where artifacts of a target live: a local directory or an S3 prefix
 */
export interface ArtifactStore {
  /** Human readable location, used in logs and retention results */
  readonly location: string;

  /** Artifacts of a target, newest first */
  list(targetId: string): Promise<StoredArtifact[]>;

  delete(targetId: string, name: string): Promise<void>;
}

/**
 * The local store also owns the cleanup of half-written archives
 */
export interface LocalStore extends ArtifactStore {
  removeStaleTemporaries(targetId: string): Promise<string[]>;
}

/**
 * An offsite store that receives a copy of each new artifact
 */
export interface RemoteStore extends ArtifactStore {
  /** Copy the artifact, resolving to its remote location */
  upload(artifact: Artifact): Promise<string>;
}
