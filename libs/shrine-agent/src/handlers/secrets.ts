/**
 * Secret handlers: get, set, remove, list
 *
 * Each request reads the shrine file afresh under the session key.
 */

import { GetParamsSchema, ListParamsSchema, RemoveParamsSchema, SessionExpiredError, SetParamsSchema } from '@shrine/ipc';
import type { WireSecret } from '@shrine/ipc';
import { CachedKeySource, SecretBytes } from '@shrine/storage';
import type { HandlerDependencies } from './types.js';
import { defineHandler } from './types.js';

function sessionKeys(deps: HandlerDependencies): CachedKeySource {
  const session = deps.sessions.current();
  if (!session) {
    throw new SessionExpiredError();
  }
  return new CachedKeySource(session.key);
}

export const handleGet = defineHandler('get', GetParamsSchema, async ({ path }, deps) => {
  const secret = await deps.repository.get(sessionKeys(deps), path);
  try {
    const { value, ...metadata } = secret;
    const wire: WireSecret = { path, ...metadata, value: value.toBase64() };
    return wire;
  } finally {
    secret.value.wipe();
  }
});

export const handleSet = defineHandler('set', SetParamsSchema, async ({ path, value, mode }, deps) => {
  const keys = sessionKeys(deps);
  const bytes = SecretBytes.fromBase64(value);
  try {
    return await deps.repository.set(keys, path, bytes, mode);
  } finally {
    bytes.wipe();
  }
});

export const handleRemove = defineHandler('remove', RemoveParamsSchema, async ({ path }, deps) =>
  deps.repository.remove(sessionKeys(deps), path),
);

export const handleList = defineHandler('list', ListParamsSchema, async ({ pattern }, deps) =>
  deps.repository.list(sessionKeys(deps), pattern),
);
