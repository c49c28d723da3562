/**
 * Agent process control
 *
 * Locates the agent entry point and starts it, detached or in the
 * foreground.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { FILE_PERMISSIONS, IoError } from '@shrine/ipc';
import { ensureRuntimeDir } from '@shrine/agent';
import type { AgentClient } from '@shrine/agent';

export interface AgentCommandLine {
  command: string;
  args: string[];
}

/**
 * The built agent, or its TypeScript source run through tsx in development.
 */
export function findAgentCommand(cwd: string = process.cwd()): AgentCommandLine | null {
  const executables = [
    path.join(__dirname, '../../../shrine-agent/dist/main.js'),
    path.join(cwd, 'libs/shrine-agent/dist/main.js'),
  ];
  const executable = executables.find((p) => fs.existsSync(p));
  if (executable) {
    return { command: process.execPath, args: [executable] };
  }

  const sources = [
    path.join(__dirname, '../../../shrine-agent/src/main.ts'),
    path.join(cwd, 'libs/shrine-agent/src/main.ts'),
  ];
  const tsxBinaries = [
    path.join(__dirname, '../../../../node_modules/.bin/tsx'),
    path.join(cwd, 'node_modules/.bin/tsx'),
  ];
  const source = sources.find((p) => fs.existsSync(p));
  const tsx = tsxBinaries.find((p) => fs.existsSync(p));
  if (source && tsx) {
    return { command: tsx, args: [source] };
  }

  return null;
}

export interface StartAgentOptions {
  shrinePath: string;
  runtimeDir: string;
  /** Session lifetime in seconds */
  ttl?: number;
  foreground?: boolean;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export type StartAgentResult =
  | { started: true; pid?: number; outputPath?: string }
  | { started: false; message: string };

const START_TIMEOUT_MS = 5_000;
const START_POLL_MS = 100;

export async function startAgentProcess(client: AgentClient, options: StartAgentOptions): Promise<StartAgentResult> {
  const agent = findAgentCommand(options.cwd);
  if (!agent) {
    return { started: false, message: 'Could not find the shrine-agent executable' };
  }

  const args = [...agent.args, '--shrine', options.shrinePath];
  if (options.ttl !== undefined) {
    args.push('--ttl', String(options.ttl));
  }

  if (options.foreground) {
    const child = spawn(agent.command, args, { stdio: 'inherit', env: options.env });
    return new Promise((resolve) => {
      child.on('exit', (code) => {
        resolve(
          code === 0
            ? { started: true, pid: child.pid }
            : { started: false, message: `Agent exited with code ${code ?? 'null'}` },
        );
      });
    });
  }

  ensureRuntimeDir(options.runtimeDir);
  const outputPath = path.join(options.runtimeDir, 'shrine-agent.out');
  const outputFd = fs.openSync(outputPath, 'a', FILE_PERMISSIONS.SHRINE_FILE);

  const spawnOptions: SpawnOptions = {
    detached: true,
    stdio: ['ignore', outputFd, outputFd],
    env: options.env,
  };

  let child: ChildProcess;
  try {
    child = spawn(agent.command, args, spawnOptions);
  } finally {
    fs.closeSync(outputFd);
  }
  child.unref();

  const deadline = Date.now() + START_TIMEOUT_MS;
  while (Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, START_POLL_MS));
    if (await client.isAvailable()) {
      return { started: true, pid: child.pid, outputPath };
    }
    if (child.exitCode !== null) break;
  }

  return { started: false, message: `Agent failed to start. Check ${outputPath}` };
}

/**
 * Wait until nothing answers on the agent socket.
 */
export async function waitForAgentExit(client: AgentClient): Promise<void> {
  const deadline = Date.now() + START_TIMEOUT_MS;
  while (Date.now() < deadline) {
    if (!(await client.isAvailable())) return;
    await new Promise((resolve) => setTimeout(resolve, START_POLL_MS));
  }
  throw new IoError('Agent did not stop in time');
}
