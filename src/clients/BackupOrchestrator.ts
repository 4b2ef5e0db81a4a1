import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BackupConfig, BackupTarget, RetryConfig } from '../interfaces/BackupConfig';
import { ArchiveWriter, Artifact } from '../interfaces/ArchiveWriter';
import { LocalStore, RemoteStore } from '../interfaces/ArtifactStore';
import {
  BackupOrchestrator as IBackupOrchestrator,
  NotificationOutcome,
  RunResult,
  RunStatus,
  TargetOutcome,
  TargetState,
} from '../interfaces/BackupOrchestrator';
import { DumpAttempt, DumpExecutor } from '../interfaces/DumpExecutor';
import { Logger } from '../interfaces/Logger';
import { Notifier } from '../interfaces/Notifier';
import { RetentionManager, RetentionResult } from '../interfaces/RetentionManager';
import {
  ArchiveWriteError,
  BackupError,
  BackupStep,
  DumpError,
  InterruptedError,
  UploadError,
  errorCode,
  formatError,
  toError,
} from '../errors/BackupError';
import { processPooled, sleep } from '../utils/concurrency';
import { WorkDirLock } from './WorkDirLock';

/**
 * Process exit codes
 */
export const ExitCode = {
  SUCCESS: 0,
  TARGET_FAILED: 1,
  CONFIGURATION_ERROR: 2,
  NOTIFICATION_FAILED: 3,
  INTERRUPTED: 4,
  FATAL: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const TRANSITIONS: Record<TargetState, readonly TargetState[]> = {
  pending: ['running', 'skipped'],
  running: ['succeeded', 'retrying', 'failed'],
  retrying: ['running', 'failed'],
  succeeded: [],
  failed: [],
  skipped: [],
};

const DUMP_FILE_EXTENSION = '.dump';
const OPTIONS_FILE_EXTENSION = '.my.cnf';

/**
 * Delay before the retry that follows attempt number `attempt`
 */
export function computeBackoff(retry: RetryConfig, attempt: number): number {
  const delay =
    retry.backoff === 'fixed'
      ? retry.initialDelayMs
      : retry.initialDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, retry.maxDelayMs);
}

export function computeRunStatus(outcomes: TargetOutcome[], interrupted: boolean): RunStatus {
  if (interrupted || outcomes.some(outcome => outcome.error?.kind === 'Interrupted')) {
    return 'interrupted';
  }

  const failed = outcomes.filter(outcome => outcome.status === 'failed').length;
  const succeeded = outcomes.filter(outcome => outcome.status === 'succeeded').length;

  if (failed === 0) return 'success';
  return succeeded > 0 ? 'partial_failure' : 'failure';
}

/**
 * Map a finished run to the process exit code. Failed targets outrank an
 * undelivered notification.
 */
export function resolveExitCode(run: RunResult): ExitCode {
  if (run.status === 'interrupted') return ExitCode.INTERRUPTED;
  if (run.outcomes.some(outcome => outcome.status === 'failed')) return ExitCode.TARGET_FAILED;
  if (run.notification && !run.notification.delivered) return ExitCode.NOTIFICATION_FAILED;
  return ExitCode.SUCCESS;
}

export interface OrchestratorDependencies {
  dumpExecutor: DumpExecutor;
  archiveWriter: ArchiveWriter;
  retentionManager: RetentionManager;
  localStore: LocalStore;
  remoteStore?: RemoteStore;
  notifier: Notifier;
  logger: Logger;

  /** Defaults to a lock file in the configured work directory */
  workDirLock?: WorkDirLock;

  /** Backoff wait, replaced in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

/**
 * Mutable bookkeeping for one target during a run, enforcing the legal
 * state transitions
 */
class TargetRun {
  state: TargetState = 'pending';
  attempts = 0;
  readonly dumpAttempts: DumpAttempt[] = [];
  readonly retention: RetentionResult[] = [];
  readonly startedAt: Date;
  artifact?: Artifact;
  error?: BackupError;

  constructor(
    readonly target: BackupTarget,
    private logger: Logger,
    now: Date
  ) {
    this.startedAt = now;
  }

  transition(to: TargetState, meta?: Record<string, unknown>): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new Error(`Illegal transition for ${this.target.id}: ${this.state} -> ${to}`);
    }
    this.logger.logTargetTransition(this.target.id, this.state, to, meta);
    this.state = to;
  }

  toOutcome(finishedAt: Date, skipReason?: string): TargetOutcome {
    if (this.state !== 'succeeded' && this.state !== 'failed' && this.state !== 'skipped') {
      throw new Error(`Target ${this.target.id} has not finished (state ${this.state})`);
    }

    const outcome: TargetOutcome = {
      targetId: this.target.id,
      status: this.state,
      attempts: this.attempts,
      dumpAttempts: [...this.dumpAttempts],
      retention: [...this.retention],
      startedAt: this.startedAt,
      finishedAt,
    };

    if (this.artifact) outcome.artifact = this.artifact;
    if (this.error) {
      outcome.error = { kind: this.error.kind, step: this.error.step, message: this.error.message };
    }
    if (skipReason) outcome.skipReason = skipReason;

    return outcome;
  }
}

/**
 * Runs every configured target through dump, archive, optional upload and
 * retention, retrying failed attempts, then reports the run exactly once.
 */
export class BackupOrchestrator implements IBackupOrchestrator {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private readonly workDirLock: WorkDirLock;

  constructor(
    private config: BackupConfig,
    private deps: OrchestratorDependencies
  ) {
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
    this.workDirLock = deps.workDirLock ?? new WorkDirLock(config.workDir, deps.logger);
  }

  async executeRun(signal?: AbortSignal): Promise<RunResult> {
    const startedAt = this.now();
    const runId = this.generateRunId(startedAt);
    const { logger } = this.deps;

    logger.logRunStart(runId, this.config.targets.length);

    const outcomes = await processPooled(
      this.config.targets,
      target => this.runTarget(target, runId, signal),
      this.config.concurrency
    );

    const result: RunResult = {
      runId,
      status: computeRunStatus(outcomes, signal?.aborted ?? false),
      outcomes,
      startedAt,
      finishedAt: this.now(),
    };

    logger.logRunComplete(runId, result.status, result.finishedAt.getTime() - startedAt.getTime(), {
      succeeded: outcomes.filter(outcome => outcome.status === 'succeeded').length,
      failed: outcomes.filter(outcome => outcome.status === 'failed').length,
      skipped: outcomes.filter(outcome => outcome.status === 'skipped').length,
    });

    result.notification = await this.deliver(result);
    return result;
  }

  /**
   * Take ownership of the work directory and remove what a killed process
   * left behind. Nothing is removed while another process owns the directory.
   */
  async cleanupStaleFiles(): Promise<boolean> {
    const { logger, localStore } = this.deps;

    if (!(await this.workDirLock.acquire())) {
      logger.warn('Skipping stale file cleanup, another process owns the work directory', {
        workDir: this.config.workDir,
      });
      return false;
    }

    let removedDumps = 0;

    let entries: string[] = [];
    try {
      entries = await fs.readdir(this.config.workDir);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        logger.warn(`Cannot read work directory ${this.config.workDir}`, { error: formatError(error) });
      }
    }

    for (const name of entries) {
      if (!name.endsWith(DUMP_FILE_EXTENSION) && !name.endsWith(OPTIONS_FILE_EXTENSION)) {
        continue;
      }
      try {
        await fs.unlink(join(this.config.workDir, name));
        removedDumps++;
      } catch (error) {
        logger.warn(`Failed to remove stale file ${name}`, { error: formatError(error) });
      }
    }

    let removedArchives = 0;
    for (const target of this.config.targets) {
      try {
        removedArchives += (await localStore.removeStaleTemporaries(target.id)).length;
      } catch (error) {
        logger.warn(`Failed to clean temporaries of ${target.id}`, {
          targetId: target.id,
          error: formatError(error),
        });
      }
    }

    if (removedDumps > 0 || removedArchives > 0) {
      logger.info('Removed stale files from a previous run', { removedDumps, removedArchives });
    }
    return true;
  }

  async releaseWorkDir(): Promise<void> {
    await this.workDirLock.release();
  }

  private async runTarget(target: BackupTarget, runId: string, signal?: AbortSignal): Promise<TargetOutcome> {
    const run = new TargetRun(target, this.deps.logger, this.now());

    if (!target.enabled) {
      run.transition('skipped', { runId, reason: 'disabled' });
      return run.toOutcome(this.now(), 'disabled');
    }

    if (signal?.aborted) {
      run.transition('skipped', { runId, reason: 'interrupted' });
      return run.toOutcome(this.now(), 'run interrupted before the target started');
    }

    const { maxAttempts } = this.config.retry;

    while (run.state === 'pending' || run.state === 'retrying') {
      run.attempts++;
      run.transition('running', { runId, attempt: run.attempts });

      const error = await this.runAttempt(run, signal);

      if (!error) {
        run.error = undefined;
        run.transition('succeeded', {
          runId,
          attempts: run.attempts,
          artifact: run.artifact?.name,
        });
        break;
      }

      run.error = error;

      if (!error.retryable || run.attempts >= maxAttempts || signal?.aborted) {
        run.transition('failed', { runId, attempts: run.attempts, kind: error.kind, step: error.step });
        this.deps.logger.error(`Backup of ${target.id} failed`, error, { runId, targetId: target.id });
        break;
      }

      const delay = computeBackoff(this.config.retry, run.attempts);
      run.transition('retrying', { runId, attempt: run.attempts, kind: error.kind, delayMs: delay });

      try {
        await this.sleep(delay, signal);
      } catch (waitError) {
        run.error = this.toBackupError(waitError, 'dump', target, signal);
        run.transition('failed', { runId, attempts: run.attempts, kind: run.error.kind });
      }
    }

    return run.toOutcome(this.now());
  }

  /**
   * One pass of dump, archive, upload and retention. Resolves to the error
   * that ended the attempt, or undefined on success.
   */
  private async runAttempt(run: TargetRun, signal?: AbortSignal): Promise<BackupError | undefined> {
    const { dumpExecutor, archiveWriter, remoteStore } = this.deps;
    const { target } = run;
    const dumpPath = join(this.config.workDir, `${target.id}-${uuidv4()}${DUMP_FILE_EXTENSION}`);
    let step: BackupStep = 'dump';

    try {
      const attempt = await dumpExecutor.runDump(target, dumpPath, target.timeoutSeconds * 1000, signal);
      run.dumpAttempts.push(attempt);
      if (attempt.error) {
        return this.toBackupError(attempt.error, step, target, signal);
      }

      step = 'archive';
      run.artifact = await archiveWriter.archive(dumpPath, target, this.now(), signal);
      const artifact = run.artifact;

      if (remoteStore) {
        step = 'upload';
        const remoteLocation = await remoteStore.upload(artifact);
        run.artifact = { ...artifact, remoteLocation };
      }

      await this.applyRetention(run, artifact.name);
      return undefined;
    } catch (error) {
      return this.toBackupError(error, step, target, signal);
    } finally {
      await this.removeDumpFile(dumpPath);
    }
  }

  private async applyRetention(run: TargetRun, currentArtifact: string): Promise<void> {
    const { retentionManager, localStore, remoteStore } = this.deps;
    const stores = remoteStore ? [localStore, remoteStore] : [localStore];

    for (const store of stores) {
      run.retention.push(
        await retentionManager.enforce(store, run.target.id, run.target.retention, currentArtifact)
      );
    }
  }

  private toBackupError(
    error: unknown,
    step: BackupStep,
    target: BackupTarget,
    signal?: AbortSignal
  ): BackupError {
    if (signal?.aborted && !(error instanceof BackupError && error.kind === 'Interrupted')) {
      return new InterruptedError(`Backup of ${target.id} was interrupted during ${step}`, step);
    }

    if (error instanceof BackupError) {
      return error;
    }

    const message = `Unexpected ${step} failure for ${target.id}: ${formatError(error)}`;
    switch (step) {
      case 'archive':
        return new ArchiveWriteError(message, toError(error));
      case 'upload':
        return new UploadError(message, toError(error));
      default:
        return new DumpError(message, 'DumpProcessError', true, null, toError(error));
    }
  }

  private async deliver(run: RunResult): Promise<NotificationOutcome> {
    const { notifier, logger } = this.deps;

    try {
      await notifier.notify(run);
      return { channel: notifier.channel, delivered: true };
    } catch (error) {
      logger.error('Failed to deliver run notification', toError(error), {
        runId: run.runId,
        channel: notifier.channel,
      });
      return { channel: notifier.channel, delivered: false, error: formatError(error) };
    }
  }

  private async removeDumpFile(dumpPath: string): Promise<void> {
    try {
      await fs.unlink(dumpPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.deps.logger.warn(`Failed to remove dump file ${dumpPath}`, { error: formatError(error) });
      }
    }
  }

  /**
   * Generate unique run ID for tracking
   */
  private generateRunId(startedAt: Date): string {
    const timestamp = startedAt.toISOString().replace(/[:.]/g, '-');
    return `run-${timestamp}-${uuidv4().slice(0, 8)}`;
  }
}
