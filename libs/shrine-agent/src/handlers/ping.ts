/**
 * Ping Handler
 *
 * Health check; the CLI uses it to pick the warm path.
 */

import { EmptyParamsSchema, VERSION } from '@shrine/ipc';
import { defineHandler } from './types.js';

export const handlePing = defineHandler('ping', EmptyParamsSchema, async (_params, deps) => ({
  pong: true,
  pid: process.pid,
  version: VERSION,
  shrinePath: deps.shrinePath,
}));
