import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { LOCK_FILE_NAME, WorkDirLock, isProcessAlive } from '../src/clients/WorkDirLock';
import { createMockLogger } from './helpers';

describe('WorkDirLock', () => {
  let root: string;
  let workDir: string;
  let lockPath: string;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'workdir-lock-'));
    workDir = path.join(root, 'work');
    lockPath = path.join(workDir, LOCK_FILE_NAME);
    logger = createMockLogger();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should create the directory and record the owning pid', async () => {
    const lock = new WorkDirLock(workDir, logger);

    await expect(lock.acquire()).resolves.toBe(true);

    expect(lock.isHeld).toBe(true);
    expect(readFileSync(lockPath, 'utf8').split('\n')[0]).toBe(String(process.pid));
  });

  it('should refuse a directory owned by a running process', async () => {
    const owner = new WorkDirLock(workDir, logger);
    await owner.acquire();

    const contender = new WorkDirLock(workDir, logger);

    await expect(contender.acquire()).resolves.toBe(false);
    expect(contender.isHeld).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      `Work directory ${workDir} is in use by process ${process.pid}`,
      expect.objectContaining({ pid: process.pid })
    );
  });

  it('should take over a lock left by a process that is gone', async () => {
    const owner = new WorkDirLock(workDir, logger);
    await owner.acquire();
    writeFileSync(lockPath, '999999\n1700000000000\n');

    const successor = new WorkDirLock(workDir, logger, pid => pid === process.pid);

    await expect(successor.acquire()).resolves.toBe(true);
    expect(readFileSync(lockPath, 'utf8').split('\n')[0]).toBe(String(process.pid));
    expect(logger.info).toHaveBeenCalledWith(`Took over stale work directory lock ${lockPath}`, {
      previousPid: 999999,
    });
  });

  it('should treat an unreadable lock as stale', async () => {
    const owner = new WorkDirLock(workDir, logger);
    await owner.acquire();
    writeFileSync(lockPath, 'garbage');

    await expect(new WorkDirLock(workDir, logger).acquire()).resolves.toBe(true);
  });

  it('should remove the lock on release', async () => {
    const lock = new WorkDirLock(workDir, logger);
    await lock.acquire();

    await lock.release();

    expect(existsSync(lockPath)).toBe(false);
    expect(lock.isHeld).toBe(false);
  });

  it('should leave a lock alone that it does not hold', async () => {
    const owner = new WorkDirLock(workDir, logger);
    await owner.acquire();

    await new WorkDirLock(workDir, logger).release();

    expect(existsSync(lockPath)).toBe(true);
  });

  it('should leave a lock in place that another process took over', async () => {
    const lock = new WorkDirLock(workDir, logger);
    await lock.acquire();
    writeFileSync(lockPath, '999999\n1700000000000\n');

    await lock.release();

    expect(existsSync(lockPath)).toBe(true);
  });
});

describe('isProcessAlive', () => {
  it('should report the current process as alive', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
