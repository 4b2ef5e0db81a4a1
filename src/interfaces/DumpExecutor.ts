import { BackupTarget } from './BackupConfig';
import { DumpError } from '../errors/BackupError';

/**
 * One execution of the dump utility for a target. Frozen once returned.
 */
export interface DumpAttempt {
  targetId: string;
  startedAt: Date;
  finishedAt: Date;

  /** Exit code of the utility, null when it was killed or never started */
  exitCode: number | null;

  /** Bytes written to the output file */
  bytes: number;

  /** Captured standard error, bounded */
  stderr: string;

  error?: DumpError;
}

export interface DumpExecutor {
  /**
   * Run the dump utility for one target, streaming its output to `outputPath`.
   * Never rejects: failures are reported through `DumpAttempt.error`.
   */
  runDump(
    target: BackupTarget,
    outputPath: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<DumpAttempt>;
}
