/**
 * Advisory lock file
 *
 * `<shrine>.lock` is created exclusively and holds the owner's pid. A lock
 * whose pid is no longer running is stale and gets taken over.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { ConcurrentModificationError, DEFAULT_LOCK_TIMEOUT_MS } from '@shrine/ipc';
import { errnoCode, toIoError } from './atomic.js';

const RETRY_INTERVAL_MS = 50;

export interface FileLockOptions {
  timeoutMs?: number;
  retryIntervalMs?: number;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(error) === 'EPERM';
  }
}

export class FileLock {
  private held = false;

  constructor(
    private readonly lockPath: string,
    private readonly options: FileLockOptions = {},
  ) {}

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    const interval = this.options.retryIntervalMs ?? RETRY_INTERVAL_MS;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (await this.tryCreate()) {
        this.held = true;
        return;
      }
      if (await this.removeIfStale()) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new ConcurrentModificationError(
          `Shrine is locked by another process (${this.lockPath}); gave up after ${timeoutMs}ms`,
        );
      }
      await sleep(interval);
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await fs.rm(this.lockPath, { force: true });
  }

  private async tryCreate(): Promise<boolean> {
    try {
      await fs.writeFile(this.lockPath, `${process.pid}\n`, { flag: 'wx', mode: 0o600 });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') return false;
      throw toIoError(error, 'create lock', this.lockPath);
    }
  }

  /**
   * Take a dead owner's lock out of the way. The file is renamed aside before
   * removal so that of several contenders only one moves it, and a fresh lock
   * created in between is put back instead of deleted.
   */
  private async removeIfStale(): Promise<boolean> {
    const pid = await readOwner(this.lockPath);
    // Released between our attempt and this read
    if (pid === null) return true;
    if (!isStale(pid)) return false;

    const aside = `${this.lockPath}.${randomUUID()}.stale`;
    try {
      await fs.rename(this.lockPath, aside);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return true;
      throw toIoError(error, 'move stale lock', this.lockPath);
    }

    try {
      const moved = await readOwner(aside);
      if (moved !== null && !isStale(moved)) {
        await this.restore(aside);
      }
    } finally {
      await fs.rm(aside, { force: true });
    }
    return true;
  }

  private async restore(aside: string): Promise<void> {
    try {
      await fs.link(aside, this.lockPath);
    } catch (error) {
      // Someone else already holds a new lock
      if (errnoCode(error) !== 'EEXIST') throw toIoError(error, 'restore lock', this.lockPath);
    }
  }
}

/** Pid in a lock file, NaN while it is still being written, null once it is gone */
async function readOwner(lockPath: string): Promise<number | null> {
  try {
    const content = await fs.readFile(lockPath, 'utf8');
    return parseInt(content.trim(), 10);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return null;
    throw toIoError(error, 'read lock', lockPath);
  }
}

function isStale(pid: number): boolean {
  return !Number.isNaN(pid) && !isProcessAlive(pid);
}

/**
 * Run `fn` while holding the lock.
 */
export async function withFileLock<T>(
  lockPath: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const lock = new FileLock(lockPath, options);
  await lock.acquire();
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
