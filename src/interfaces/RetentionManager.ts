import { RetentionPolicy } from './BackupConfig';
import { ArtifactStore } from './ArtifactStore';

/**
 * Result of a retention pass over one store for one target
 */
export interface RetentionResult {
  /** Store location the pass ran against */
  location: string;

  /** Names of the artifacts that were deleted */
  deleted: string[];

  /** Names of the artifacts that were kept */
  kept: string[];

  /** Deletions that failed, the artifacts are still present */
  failed: Array<{ name: string; error: string }>;

  /** Set when the pass did not run at all */
  skippedReason?: string;
}

/**
 * Interface for managing backup retention and cleanup
 */
export interface RetentionManager {
  /**
   * Apply the retention policy to a target's artifacts in a store
   * @param currentArtifact name of the artifact produced by the current run, never deleted
   */
  enforce(
    store: ArtifactStore,
    targetId: string,
    policy: RetentionPolicy,
    currentArtifact: string
  ): Promise<RetentionResult>;

  /** Names from `artifacts` (newest first) that fall outside the policy */
  selectExpired(
    artifacts: Array<{ name: string; timestamp: Date }>,
    policy: RetentionPolicy,
    currentArtifact: string,
    now?: Date
  ): string[];
}
