import { promises as fs } from 'fs';
import * as path from 'path';
import { Logger } from '../interfaces/Logger';
import { errorCode, formatError } from '../errors/BackupError';

export const LOCK_FILE_NAME = '.db-backup.lock';

/** Lock file content: owner pid and acquisition time */
interface LockOwner {
  pid: number;
  acquiredAt: number;
}

function parseOwner(content: string): LockOwner | undefined {
  const [pidLine = '', timeLine = ''] = content.trim().split('\n');
  const pid = Number.parseInt(pidLine, 10);
  const acquiredAt = Number.parseInt(timeLine, 10);
  return Number.isNaN(pid) || Number.isNaN(acquiredAt) ? undefined : { pid, acquiredAt };
}

/**
 * Signal 0 only checks that the process exists. EPERM means it exists but
 * belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

/**
 * Exclusive ownership of a work directory, held for the lifetime of the
 * process. A lock left behind by a process that is no longer running is
 * taken over.
 */
export class WorkDirLock {
  readonly lockPath: string;
  private held = false;

  constructor(
    private workDir: string,
    private logger: Logger,
    private isAlive: (pid: number) => boolean = isProcessAlive
  ) {
    this.lockPath = path.join(workDir, LOCK_FILE_NAME);
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Resolves to false when another running process owns the directory
   */
  async acquire(): Promise<boolean> {
    if (this.held) return true;

    await fs.mkdir(this.workDir, { recursive: true });
    const content = `${process.pid}\n${Date.now()}\n`;

    try {
      await fs.writeFile(this.lockPath, content, { flag: 'wx' });
      this.held = true;
      this.logger.debug(`Acquired work directory lock ${this.lockPath}`);
      return true;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') throw error;
    }

    const owner = await this.readOwner();
    if (owner && this.isAlive(owner.pid)) {
      this.logger.warn(`Work directory ${this.workDir} is in use by process ${owner.pid}`, {
        pid: owner.pid,
        since: new Date(owner.acquiredAt).toISOString(),
      });
      return false;
    }

    return this.takeOver(content, owner);
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;

    const owner = await this.readOwner();
    if (owner?.pid !== process.pid) {
      this.logger.warn(`Work directory lock ${this.lockPath} was taken over, leaving it in place`);
      return;
    }

    try {
      await fs.unlink(this.lockPath);
      this.logger.debug(`Released work directory lock ${this.lockPath}`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Failed to remove work directory lock ${this.lockPath}`, { error: formatError(error) });
      }
    }
  }

  /**
   * Replace a stale lock with a rename, after checking the owner has not changed meanwhile
   */
  private async takeOver(content: string, stale: LockOwner | undefined): Promise<boolean> {
    const tempPath = `${this.lockPath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, content);

    const current = await this.readOwner();
    if (current && current.pid !== stale?.pid && this.isAlive(current.pid)) {
      await fs.unlink(tempPath);
      return false;
    }

    await fs.rename(tempPath, this.lockPath);
    this.held = true;
    this.logger.info(`Took over stale work directory lock ${this.lockPath}`, { previousPid: stale?.pid });
    return true;
  }

  private async readOwner(): Promise<LockOwner | undefined> {
    try {
      return parseOwner(await fs.readFile(this.lockPath, 'utf8'));
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return undefined;
      throw error;
    }
  }
}
