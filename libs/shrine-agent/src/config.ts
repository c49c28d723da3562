/**
 * Agent configuration
 *
 * Resolved from the shrine path given on the command line plus `SHRINE_*`
 * environment variables.
 */

import * as path from 'node:path';
import { loadShrineEnv, sessionTtlMs } from '@shrine/ipc';
import type { LogLevel } from '@shrine/ipc';
import { getLogPath, getPidPath, getRuntimeDir, getSocketPath } from './paths.js';

export interface AgentConfig {
  shrinePath: string;
  runtimeDir: string;
  socketPath: string;
  pidPath: string;
  logPath: string;
  ttlMs: number;
  logLevel: LogLevel;
  lockTimeoutMs: number;
}

export interface AgentConfigOverrides {
  /** Session lifetime in seconds */
  ttl?: number;
  runtimeDir?: string;
}

export function loadAgentConfig(
  shrinePath: string,
  overrides: AgentConfigOverrides = {},
  processEnv: NodeJS.ProcessEnv = process.env,
): AgentConfig {
  const env = loadShrineEnv(processEnv);
  const runtimeDir = getRuntimeDir({ runtimeDir: overrides.runtimeDir ?? env.runtimeDir }, processEnv);
  const socketPath = getSocketPath(runtimeDir, shrinePath);

  return {
    shrinePath: path.resolve(shrinePath),
    runtimeDir,
    socketPath,
    pidPath: getPidPath(socketPath),
    logPath: getLogPath(runtimeDir),
    ttlMs: sessionTtlMs({ ...env, agentTtl: overrides.ttl ?? env.agentTtl }),
    logLevel: env.logLevel,
    lockTimeoutMs: env.lockTimeoutMs,
  };
}
