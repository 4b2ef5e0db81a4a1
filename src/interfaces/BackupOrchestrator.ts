import { Artifact } from './ArchiveWriter';
import { DumpAttempt } from './DumpExecutor';
import { RetentionResult } from './RetentionManager';
import { BackupErrorKind, BackupStep } from '../errors/BackupError';

/**
 * Per target states of the orchestrator's state machine
 */
export type TargetState = 'pending' | 'running' | 'retrying' | 'succeeded' | 'failed' | 'skipped';

export type TargetStatus = 'succeeded' | 'failed' | 'skipped';

export type RunStatus = 'success' | 'partial_failure' | 'failure' | 'interrupted';

export interface OutcomeError {
  kind: BackupErrorKind;
  step: BackupStep;
  message: string;
}

/**
 * One target's final result for a run
 */
export interface TargetOutcome {
  targetId: string;
  status: TargetStatus;

  /** Number of dump attempts made */
  attempts: number;

  dumpAttempts: DumpAttempt[];
  artifact?: Artifact;
  error?: OutcomeError;
  retention: RetentionResult[];

  /** Why a target was skipped */
  skipReason?: string;

  startedAt: Date;
  finishedAt: Date;
}

export interface NotificationOutcome {
  channel: string;
  delivered: boolean;
  error?: string;
}

export interface RunResult {
  runId: string;
  status: RunStatus;

  /** Outcomes in configuration order */
  outcomes: TargetOutcome[];

  startedAt: Date;
  finishedAt: Date;

  /** Filled in after the single notification attempt */
  notification?: NotificationOutcome;
}

/**
 * Interface for the backup run orchestrator
 */
export interface BackupOrchestrator {
  /** Back up every configured target and notify once */
  executeRun(signal?: AbortSignal): Promise<RunResult>;

  /**
   * Remove temporaries left behind by a killed process. Resolves to false,
   * without removing anything, when another process owns the work directory.
   */
  cleanupStaleFiles(): Promise<boolean>;

  /** Give up ownership of the work directory */
  releaseWorkDir(): Promise<void>;
}
