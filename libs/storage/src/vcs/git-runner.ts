/**
 * Runs the `git` executable
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { GitError } from '@shrine/ipc';
import { errorMessage } from '../fs/atomic.js';

const execFileAsync = promisify(execFile);

const GIT_TIMEOUT_MS = 30_000;

export interface GitRunner {
  run(args: string[], cwd: string): Promise<string>;
}

export class ExecGitRunner implements GitRunner {
  constructor(private readonly binary = 'git') {}

  async run(args: string[], cwd: string): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, args, {
        cwd,
        timeout: GIT_TIMEOUT_MS,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
      return stdout;
    } catch (error) {
      const stderr =
        typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string'
          ? error.stderr.trim()
          : '';
      const reason = stderr || errorMessage(error);
      throw new GitError(`git ${args[0] ?? ''} failed: ${reason}`, { cause: error });
    }
  }
}
