/**
 * Session handlers: status, unlock, lock, shutdown
 */

import { EmptyParamsSchema, UnlockParamsSchema } from '@shrine/ipc';
import type { StatusResult } from '@shrine/ipc';
import { defineHandler } from './types.js';

export const handleStatus = defineHandler('status', EmptyParamsSchema, async (_params, deps) => {
  const session = deps.sessions.current();
  const result: StatusResult = { state: deps.sessions.state, shrinePath: deps.shrinePath };
  if (session) {
    result.expiresAt = session.expiresAt;
  }
  return result;
});

/**
 * Derive the key and prove it opens the shrine before caching it. A wrong
 * password leaves the agent locked.
 */
export const handleUnlock = defineHandler('unlock', UnlockParamsSchema, async ({ password }, deps) => {
  deps.sessions.beginUnlock();
  try {
    const key = await deps.repository.unlock(password);
    const session = deps.sessions.open(key);
    deps.logger.info('Session unlocked', { expiresAt: new Date(session.expiresAt).toISOString() });
    return { expiresAt: session.expiresAt };
  } finally {
    deps.sessions.abortUnlock();
  }
});

export const handleLock = defineHandler('lock', EmptyParamsSchema, async (_params, deps) => {
  deps.sessions.clear('lock');
  return { locked: true };
});

export const handleShutdown = defineHandler('shutdown', EmptyParamsSchema, async (_params, deps) => {
  deps.sessions.clear('shutdown');
  deps.requestShutdown();
  return { stopping: true };
});
