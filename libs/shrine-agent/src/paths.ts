/**
 * Runtime path utilities for the shrine agent
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  AGENT_LOG_FILE,
  AGENT_PID_SUFFIX,
  AGENT_SOCKET_PREFIX,
  AGENT_SOCKET_SUFFIX,
  FILE_PERMISSIONS,
} from '@shrine/ipc';
import type { ShrineEnv } from '@shrine/ipc';

/**
 * Directory holding agent sockets, pid files and the audit log.
 * SHRINE_RUNTIME_DIR, then XDG_RUNTIME_DIR, then a per-user tmp dir.
 */
export function getRuntimeDir(env: Pick<ShrineEnv, 'runtimeDir'>, processEnv: NodeJS.ProcessEnv = process.env): string {
  if (env.runtimeDir) return path.resolve(env.runtimeDir);
  const xdg = processEnv['XDG_RUNTIME_DIR'];
  if (xdg) return path.resolve(xdg);
  const uid = process.getuid?.() ?? os.userInfo().username;
  return path.join(os.tmpdir(), `shrine-${uid}`);
}

/**
 * Create the runtime dir owner-only if missing.
 */
export function ensureRuntimeDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: FILE_PERMISSIONS.RUNTIME_DIR });
  }
}

/**
 * Socket of the agent serving `shrinePath`: one per shrine file.
 */
export function getSocketPath(runtimeDir: string, shrinePath: string): string {
  const digest = crypto.createHash('sha256').update(path.resolve(shrinePath)).digest('hex').slice(0, 16);
  return path.join(runtimeDir, `${AGENT_SOCKET_PREFIX}${digest}${AGENT_SOCKET_SUFFIX}`);
}

export function getPidPath(socketPath: string): string {
  return socketPath.endsWith(AGENT_SOCKET_SUFFIX)
    ? `${socketPath.slice(0, -AGENT_SOCKET_SUFFIX.length)}${AGENT_PID_SUFFIX}`
    : `${socketPath}${AGENT_PID_SUFFIX}`;
}

export function getLogPath(runtimeDir: string): string {
  return path.join(runtimeDir, AGENT_LOG_FILE);
}
