/**
 * Request handlers
 */

import { handlePing } from './ping.js';
import { handleGet, handleList, handleRemove, handleSet } from './secrets.js';
import { handleLock, handleShutdown, handleStatus, handleUnlock } from './session.js';
import type { HandlerTable } from './types.js';

export { handlePing } from './ping.js';
export { handleGet, handleList, handleRemove, handleSet } from './secrets.js';
export { handleLock, handleShutdown, handleStatus, handleUnlock } from './session.js';
export * from './types.js';

export const handlers: HandlerTable = {
  ping: handlePing,
  status: handleStatus,
  unlock: handleUnlock,
  lock: handleLock,
  get: handleGet,
  set: handleSet,
  remove: handleRemove,
  list: handleList,
  shutdown: handleShutdown,
};
