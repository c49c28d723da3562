/**
 * Atomic file replacement
 *
 * Data goes to a sibling temp file which is fsynced and then renamed over the
 * target, so a reader only ever sees the old or the new content.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { IoError, NotFoundError, isShrineError } from '@shrine/ipc';

export interface AtomicWriteOptions {
  mode?: number;
  /** Runs after the temp file is durable and before the rename; throwing aborts the write */
  beforeRename?: () => Promise<void>;
}

/**
 * Node errors may come from another realm (Jest's vm contexts), so they are
 * read by shape rather than by `instanceof`.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function isNotFound(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}

/**
 * Wrap a Node filesystem error as an IoError; domain errors pass through.
 */
export function toIoError(error: unknown, action: string, target: string): Error {
  if (isShrineError(error)) {
    return error;
  }
  return new IoError(`Failed to ${action} ${target}: ${errorMessage(error)}`, { cause: error });
}

export function fingerprint(data: Uint8Array): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Read a file. ENOENT → NotFoundError, other failures → IoError.
 */
export async function readFileStrict(target: string): Promise<Buffer> {
  try {
    return await fs.readFile(target);
  } catch (error) {
    if (isNotFound(error)) {
      throw new NotFoundError(`No shrine at ${target}`);
    }
    throw toIoError(error, 'read', target);
  }
}

/**
 * Fingerprint of the file as it is on disk now, or null if it does not exist.
 */
export async function readFingerprint(target: string): Promise<string | null> {
  try {
    return fingerprint(await fs.readFile(target));
  } catch (error) {
    if (isNotFound(error)) return null;
    throw toIoError(error, 'read', target);
  }
}

export async function writeFileAtomic(
  target: string,
  data: Uint8Array,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const tmpPath = path.join(path.dirname(target), `.${path.basename(target)}.${crypto.randomUUID()}.tmp`);
  let renamed = false;

  try {
    const handle = await fs.open(tmpPath, 'wx', options.mode ?? 0o600);
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (options.beforeRename) {
      await options.beforeRename();
    }

    await fs.rename(tmpPath, target);
    renamed = true;
  } catch (error) {
    throw toIoError(error, 'write', target);
  } finally {
    if (!renamed) {
      await fs.rm(tmpPath, { force: true });
    }
  }
}
