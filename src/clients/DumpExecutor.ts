import { spawn } from 'child_process';
import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { BackupTarget } from '../interfaces/BackupConfig';
import { DumpAttempt, DumpExecutor as IDumpExecutor } from '../interfaces/DumpExecutor';
import { Logger } from '../interfaces/Logger';
import { DumpError, errorCode, formatError, toError } from '../errors/BackupError';

const MAX_STDERR_BYTES = 64 * 1024;
const MAX_ERROR_DETAIL_CHARS = 2000;
export const DEFAULT_KILL_GRACE_MS = 5000;

/**
 * Stderr fragments that will not go away by trying again
 */
const NON_RETRYABLE_PATTERNS = [
  'authentication failed',
  'access denied for user',
  'unknown database',
  'could not translate host name',
  'unknown mysql server host',
  'name or service not known',
  'permission denied',
];

export interface DumpCommand {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;

  /** Files that hold credentials for this invocation only */
  secretFiles: string[];
}

export interface DumpExecutorOptions {
  /** Time between SIGTERM and SIGKILL once a dump must stop */
  killGraceMs?: number;
}

interface ProcessOutcome {
  exitCode: number | null;
  stderr: string;
  termination?: 'timeout' | 'aborted';
  spawnError?: Error;
  writeError?: Error;
}

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function appendLimited(state: CaptureState, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_STDERR_BYTES) {
    const keep = Math.max(0, MAX_STDERR_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_STDERR_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function quoteOptionValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Runs pg_dump, pg_dumpall or mysqldump for one target and streams its output to a file
 */
export class DumpExecutor implements IDumpExecutor {
  private killGraceMs: number;

  constructor(
    private logger: Logger,
    options: DumpExecutorOptions = {}
  ) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  async runDump(
    target: BackupTarget,
    outputPath: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<DumpAttempt> {
    const startedAt = new Date();
    let command: DumpCommand | undefined;
    let outcome: ProcessOutcome | undefined;
    let error: DumpError | undefined;
    let bytes = 0;

    try {
      if (signal?.aborted) {
        throw new DumpError(`Dump of ${target.id} cancelled before start`, 'Interrupted', false);
      }

      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      command = await this.buildCommand(target, outputPath);

      this.logger.debug(`Executing ${command.command} for target ${target.id}`, {
        targetId: target.id,
        engine: target.engine,
        timeoutMs,
      });

      outcome = await this.execute(command, outputPath, timeoutMs, signal);
      bytes = await this.outputSize(outputPath);
      error = this.classify(target, command, outcome, timeoutMs, bytes);
    } catch (caught) {
      error =
        caught instanceof DumpError
          ? caught
          : new DumpError(
              `Failed to run dump for ${target.id}: ${formatError(caught)}`,
              'DumpProcessError',
              true,
              null,
              toError(caught)
            );
    } finally {
      if (command) {
        await this.removeSecretFiles(command.secretFiles);
      }
    }

    if (error) {
      await this.removePartialFile(outputPath);
      bytes = 0;
    } else if (outcome?.stderr.trim()) {
      this.logger.warn(`Dump utility reported warnings for ${target.id}`, {
        targetId: target.id,
        stderr: outcome.stderr.trim().slice(0, MAX_ERROR_DETAIL_CHARS),
      });
    }

    const attempt: DumpAttempt = {
      targetId: target.id,
      startedAt,
      finishedAt: new Date(),
      exitCode: outcome?.exitCode ?? null,
      bytes,
      stderr: outcome?.stderr ?? '',
    };
    if (error) {
      attempt.error = error;
    }

    return Object.freeze(attempt);
  }

  /**
   * Build the dump invocation. Credentials travel through the child's
   * environment or a private options file, never through arguments.
   */
  async buildCommand(target: BackupTarget, outputPath: string): Promise<DumpCommand> {
    const database = target.allDatabases ? undefined : target.database;

    if (target.engine === 'postgres') {
      const env: NodeJS.ProcessEnv = { ...process.env };
      if (target.password !== undefined) {
        env.PGPASSWORD = target.password;
      }

      return {
        command: target.dumpCommand ?? (database === undefined ? 'pg_dumpall' : 'pg_dump'),
        args: [
          '--host',
          target.host,
          '--port',
          String(target.port),
          '--username',
          target.user,
          ...(database === undefined ? [] : ['--dbname', database]),
          '--no-password',
          '--no-owner',
          '--no-acl',
          ...target.extraArgs,
        ],
        env,
        secretFiles: [],
      };
    }

    const optionsFile = path.join(
      path.dirname(outputPath),
      `.${path.basename(outputPath)}.my.cnf`
    );
    const lines = [
      '[client]',
      `host=${target.host}`,
      `port=${target.port}`,
      `user=${target.user}`,
      ...(target.password !== undefined ? [`password=${quoteOptionValue(target.password)}`] : []),
    ];
    await fs.writeFile(optionsFile, `${lines.join('\n')}\n`, { mode: 0o600 });

    return {
      command: target.dumpCommand ?? 'mysqldump',
      args: [
        `--defaults-extra-file=${optionsFile}`,
        '--single-transaction',
        '--routines',
        '--no-tablespaces',
        ...(database === undefined ? ['--all-databases'] : []),
        ...target.extraArgs,
        ...(database === undefined ? [] : [database]),
      ],
      env: { ...process.env },
      secretFiles: [optionsFile],
    };
  }

  private async execute(
    command: DumpCommand,
    outputPath: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ProcessOutcome> {
    const child = spawn(command.command, command.args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: command.env,
    });

    const stderrState: CaptureState = { chunks: [], bytes: 0, truncated: false };
    child.stderr.on('data', (chunk: Buffer) => appendLimited(stderrState, chunk));

    const copy = pipeline(child.stdout, createWriteStream(outputPath)).then(
      () => undefined,
      (error: unknown) => toError(error)
    );

    let termination: ProcessOutcome['termination'];
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = (reason: 'timeout' | 'aborted'): void => {
      if (termination) return;
      termination = reason;
      this.logger.warn(`Terminating dump process (${reason})`, { pid: child.pid, reason });

      // Try graceful termination first
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          this.logger.warn('Force killing dump process', { pid: child.pid });
          child.kill('SIGKILL');
        }
      }, this.killGraceMs);
    };

    const timer = setTimeout(() => terminate('timeout'), timeoutMs);
    const onAbort = (): void => terminate('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });
    // The listener never fires for a signal aborted while the command was being prepared
    if (signal?.aborted) terminate('aborted');

    const exit = await new Promise<{ code: number | null; spawnError?: Error }>(resolve => {
      child.once('error', error => resolve({ code: null, spawnError: error }));
      child.once('close', (code: number | null) => resolve({ code }));
    });

    clearTimeout(timer);
    if (killTimer) clearTimeout(killTimer);
    signal?.removeEventListener('abort', onAbort);

    const writeError = await copy;
    const stderr =
      Buffer.concat(stderrState.chunks).toString('utf8') +
      (stderrState.truncated ? '\n[stderr truncated]\n' : '');

    const outcome: ProcessOutcome = { exitCode: exit.code, stderr };
    if (termination) outcome.termination = termination;
    if (exit.spawnError) outcome.spawnError = exit.spawnError;
    if (writeError && !termination && !exit.spawnError) outcome.writeError = writeError;
    return outcome;
  }

  private classify(
    target: BackupTarget,
    command: DumpCommand,
    outcome: ProcessOutcome,
    timeoutMs: number,
    bytes: number
  ): DumpError | undefined {
    if (outcome.termination === 'timeout') {
      return new DumpError(
        `Dump of ${target.id} timed out after ${timeoutMs}ms`,
        'Timeout',
        true,
        outcome.exitCode
      );
    }

    if (outcome.termination === 'aborted') {
      return new DumpError(`Dump of ${target.id} was interrupted`, 'Interrupted', false, outcome.exitCode);
    }

    if (outcome.spawnError) {
      return this.analyzeSpawnError(command.command, outcome.spawnError);
    }

    if (outcome.writeError) {
      return new DumpError(
        `Failed to write dump output for ${target.id}: ${formatError(outcome.writeError)}`,
        'DumpProcessError',
        true,
        outcome.exitCode,
        outcome.writeError
      );
    }

    if (outcome.exitCode !== 0) {
      return this.analyzeExitError(target, command.command, outcome.exitCode, outcome.stderr);
    }

    if (bytes === 0) {
      return new DumpError(
        `${command.command} exited successfully but produced no output for ${target.id}`,
        'EmptyOutput',
        true,
        0
      );
    }

    return undefined;
  }

  /**
   * Analyze a non-zero exit and attach the captured stderr
   */
  private analyzeExitError(
    target: BackupTarget,
    commandName: string,
    exitCode: number | null,
    stderr: string
  ): DumpError {
    const lowerStderr = stderr.toLowerCase();
    const retryable = !NON_RETRYABLE_PATTERNS.some(pattern => lowerStderr.includes(pattern)) &&
      !(lowerStderr.includes('database') && lowerStderr.includes('does not exist'));

    const detail = stderr.trim().slice(0, MAX_ERROR_DETAIL_CHARS) || 'No additional error information available';
    return new DumpError(
      `${commandName} failed for ${target.id} with exit code ${exitCode ?? 'unknown'}: ${detail}`,
      'DumpProcessError',
      retryable,
      exitCode
    );
  }

  private analyzeSpawnError(commandName: string, error: Error): DumpError {
    const code = errorCode(error);

    if (code === 'ENOENT') {
      return new DumpError(
        `${commandName} command not found. Please ensure the database client tools are installed.`,
        'DumpProcessError',
        false,
        null,
        error
      );
    }

    if (code === 'EACCES' || code === 'EPERM') {
      return new DumpError(
        `Permission denied executing ${commandName}. Please check file permissions.`,
        'DumpProcessError',
        false,
        null,
        error
      );
    }

    return new DumpError(`Failed to execute ${commandName}: ${error.message}`, 'DumpProcessError', true, null, error);
  }

  private async outputSize(outputPath: string): Promise<number> {
    try {
      const stats = await fs.stat(outputPath);
      return stats.size;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  private async removePartialFile(outputPath: string): Promise<void> {
    try {
      await fs.unlink(outputPath);
      this.logger.debug(`Removed partial dump file: ${outputPath}`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Failed to remove partial dump file ${outputPath}`, { error: formatError(error) });
      }
    }
  }

  private async removeSecretFiles(files: string[]): Promise<void> {
    for (const file of files) {
      try {
        await fs.unlink(file);
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') {
          this.logger.error(`Failed to remove credentials file ${file}`, toError(error));
        }
      }
    }
  }
}
