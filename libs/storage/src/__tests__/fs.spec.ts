/**
 * Atomic write and advisory lock tests: real filesystem with tmp dirs
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as vm from 'node:vm';
import { ConcurrentModificationError, NotFoundError } from '@shrine/ipc';
import { errnoCode, errorMessage, fingerprint, isNotFound, readFileStrict, readFingerprint, toIoError, writeFileAtomic } from '../fs/atomic';
import { FileLock, withFileLock } from '../fs/file-lock';

// Far above any pid_max, so never a running process
const DEAD_PID = 2 ** 30;

describe('atomic write', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shrine-fs-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes the file with owner-only permissions', async () => {
    const target = path.join(tmpDir, 'shrine');
    await writeFileAtomic(target, Buffer.from('data'), { mode: 0o600 });
    expect(fs.readFileSync(target, 'utf8')).toBe('data');
    expect(fs.statSync(target).mode & 0o777).toBe(0o600);
  });

  it('replaces existing content and leaves no temp file', async () => {
    const target = path.join(tmpDir, 'shrine');
    fs.writeFileSync(target, 'old');
    await writeFileAtomic(target, Buffer.from('new'));
    expect(fs.readFileSync(target, 'utf8')).toBe('new');
    expect(fs.readdirSync(tmpDir)).toEqual(['shrine']);
  });

  it('keeps the original and removes the temp file when beforeRename throws', async () => {
    const target = path.join(tmpDir, 'shrine');
    fs.writeFileSync(target, 'old');

    await expect(
      writeFileAtomic(target, Buffer.from('new'), {
        beforeRename: async () => {
          throw new ConcurrentModificationError();
        },
      }),
    ).rejects.toBeInstanceOf(ConcurrentModificationError);

    expect(fs.readFileSync(target, 'utf8')).toBe('old');
    expect(fs.readdirSync(tmpDir)).toEqual(['shrine']);
  });

  it('fingerprints content, null for a missing file', async () => {
    const target = path.join(tmpDir, 'shrine');
    expect(await readFingerprint(target)).toBeNull();
    fs.writeFileSync(target, 'abc');
    expect(await readFingerprint(target)).toBe(fingerprint(Buffer.from('abc')));
    expect(fingerprint(Buffer.from('abc'))).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('readFileStrict maps a missing file to NotFoundError', async () => {
    await expect(readFileStrict(path.join(tmpDir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('errno inspection', () => {
  const foreign = (code: string): unknown =>
    vm.runInNewContext(`Object.assign(new Error('gone'), { code: ${JSON.stringify(code)} })`);

  it('reads the code of an error from another realm', () => {
    const error = foreign('ENOENT');
    expect(error instanceof Error).toBe(false);
    expect(errnoCode(error)).toBe('ENOENT');
    expect(isNotFound(error)).toBe(true);
    expect(errorMessage(error)).toBe('gone');
  });

  it('keeps the message of a foreign error when wrapping it', () => {
    expect(toIoError(foreign('EACCES'), 'read', '/x/shrine').message).toBe('Failed to read /x/shrine: gone');
  });

  it('ignores values without a string code', () => {
    expect(errnoCode({ code: 2 })).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('FileLock', () => {
  let tmpDir: string;
  let lockPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shrine-lock-'));
    lockPath = path.join(tmpDir, 'shrine.lock');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes the pid and removes the file on release', async () => {
    const lock = new FileLock(lockPath);
    await lock.acquire();
    expect(lock.isHeld).toBe(true);
    expect(fs.readFileSync(lockPath, 'utf8')).toBe(`${process.pid}\n`);
    await lock.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('times out with ConcurrentModificationError while a live process holds it', async () => {
    fs.writeFileSync(lockPath, `${process.pid}\n`);
    const lock = new FileLock(lockPath, { timeoutMs: 100, retryIntervalMs: 10 });
    await expect(lock.acquire()).rejects.toBeInstanceOf(ConcurrentModificationError);
    expect(fs.existsSync(lockPath)).toBe(true);
  });

  it('takes over a lock left by a dead process', async () => {
    fs.writeFileSync(lockPath, `${DEAD_PID}\n`);
    const lock = new FileLock(lockPath, { timeoutMs: 100 });
    await lock.acquire();
    expect(fs.readFileSync(lockPath, 'utf8')).toBe(`${process.pid}\n`);
    await lock.release();
  });

  it('lets only one of several contenders take over a stale lock', async () => {
    fs.writeFileSync(lockPath, `${DEAD_PID}\n`);
    let active = 0;
    let overlapped = false;
    const task = () =>
      withFileLock(lockPath, { retryIntervalMs: 5 }, async () => {
        active += 1;
        if (active > 1) overlapped = true;
        await new Promise((resolve) => setTimeout(resolve, 10));
        active -= 1;
      });

    await Promise.all([task(), task(), task(), task()]);
    expect(overlapped).toBe(false);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('serializes concurrent holders', async () => {
    const order: string[] = [];
    const task = (name: string) =>
      withFileLock(lockPath, { retryIntervalMs: 5 }, async () => {
        order.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push(`${name}:end`);
      });

    await Promise.all([task('a'), task('b')]);
    const first = order[0]?.split(':')[0];
    const second = first === 'a' ? 'b' : 'a';
    expect(order).toEqual([`${first}:start`, `${first}:end`, `${second}:start`, `${second}:end`]);
  });

  it('releases the lock when the callback throws', async () => {
    await expect(
      withFileLock(lockPath, {}, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(fs.existsSync(lockPath)).toBe(false);
  });
});
