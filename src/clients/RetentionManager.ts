import { RetentionPolicy } from '../interfaces/BackupConfig';
import { ArtifactStore, StoredArtifact } from '../interfaces/ArtifactStore';
import { Logger } from '../interfaces/Logger';
import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { formatError, toError } from '../errors/BackupError';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * RetentionManager implementation for managing backup lifecycle.
 * An artifact is kept when it is among the newest `keepLast` or younger than
 * `maxAgeDays`; the artifact of the current run is kept regardless.
 */
export class RetentionManager implements IRetentionManager {
  constructor(
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) {}

  async enforce(
    store: ArtifactStore,
    targetId: string,
    policy: RetentionPolicy,
    currentArtifact: string
  ): Promise<RetentionResult> {
    const result: RetentionResult = {
      location: store.location,
      deleted: [],
      kept: [],
      failed: [],
    };

    if (policy.keepLast === undefined && policy.maxAgeDays === undefined) {
      this.logger.debug(`No retention policy for ${targetId}, keeping all artifacts`, {
        targetId,
        location: store.location,
      });
      result.skippedReason = 'no retention policy configured';
      return result;
    }

    let artifacts: StoredArtifact[];
    try {
      artifacts = await store.list(targetId);
    } catch (error) {
      this.logger.error(`Failed to list artifacts of ${targetId}`, toError(error), {
        targetId,
        location: store.location,
      });
      result.skippedReason = `listing failed: ${formatError(error)}`;
      return result;
    }

    if (!artifacts.some(artifact => artifact.name === currentArtifact)) {
      this.logger.warn(`Current artifact ${currentArtifact} not found, retention skipped`, {
        targetId,
        location: store.location,
      });
      result.skippedReason = `current artifact ${currentArtifact} not found in listing`;
      result.kept = artifacts.map(artifact => artifact.name);
      return result;
    }

    const expired = new Set(this.selectExpired(artifacts, policy, currentArtifact));

    for (const artifact of artifacts) {
      if (!expired.has(artifact.name)) {
        result.kept.push(artifact.name);
        continue;
      }

      try {
        await store.delete(targetId, artifact.name);
        result.deleted.push(artifact.name);
        this.logger.debug(`Deleted expired artifact ${artifact.name}`, {
          targetId,
          location: store.location,
        });
      } catch (error) {
        const message = formatError(error);
        result.failed.push({ name: artifact.name, error: message });
        this.logger.warn(`Failed to delete expired artifact ${artifact.name}`, {
          targetId,
          location: store.location,
          error: message,
        });
      }
    }

    this.logger.logRetention(targetId, store.location, result.deleted.length, result.kept.length);
    return result;
  }

  selectExpired(
    artifacts: Array<{ name: string; timestamp: Date }>,
    policy: RetentionPolicy,
    currentArtifact: string,
    now: Date = this.now()
  ): string[] {
    const { keepLast, maxAgeDays } = policy;
    if (keepLast === undefined && maxAgeDays === undefined) {
      return [];
    }

    const cutoff = maxAgeDays !== undefined ? now.getTime() - maxAgeDays * DAY_MS : undefined;

    return artifacts
      .filter((artifact, index) => {
        if (artifact.name === currentArtifact) return false;
        const keptByCount = keepLast !== undefined && index < keepLast;
        const keptByAge = cutoff !== undefined && artifact.timestamp.getTime() >= cutoff;
        return !keptByCount && !keptByAge;
      })
      .map(artifact => artifact.name);
  }
}
