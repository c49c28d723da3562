/**
 * Shared helpers for CLI tests: in-memory streams, a recording git runner
 * and a runner for one CLI invocation.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { GitRunner } from '@shrine/storage';
import type { CliEnvironment, OutputStream } from '../context';
import { runCli } from '../program';

export class MemoryStream implements OutputStream {
  isTTY = false;
  private chunks: Buffer[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    return true;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Records git invocations instead of running git. `init` creates the
 * `.git` directory so later calls see a repository.
 */
export class FakeGitRunner implements GitRunner {
  readonly calls: string[][] = [];
  readonly commits: string[] = [];

  async run(args: string[], cwd: string): Promise<string> {
    this.calls.push(args);
    if (args[0] === 'init') {
      fs.mkdirSync(path.join(cwd, '.git'), { recursive: true });
    }
    if (args.includes('commit')) {
      const message = args[args.indexOf('-m') + 1];
      if (message !== undefined) this.commits.push(message);
    }
    return '';
  }
}

export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface TestShell {
  folder: string;
  env: NodeJS.ProcessEnv;
  git: FakeGitRunner;
  prompts: string[];
  /** Answers handed out, in order, to password prompts */
  answers: string[];
  stdin: Buffer;
  run(...argv: string[]): Promise<RunResult>;
}

export function createShell(folder: string, runtimeDir: string): TestShell {
  const shell: TestShell = {
    folder,
    env: { SHRINE_RUNTIME_DIR: runtimeDir, SHRINE_KDF_ITERATIONS: '1000', SHRINE_LOCK_TIMEOUT_MS: '1000' },
    git: new FakeGitRunner(),
    prompts: [],
    answers: [],
    stdin: Buffer.alloc(0),
    async run(...argv: string[]): Promise<RunResult> {
      const stdout = new MemoryStream();
      const stderr = new MemoryStream();
      const io: CliEnvironment = {
        stdout,
        stderr,
        cwd: shell.folder,
        env: shell.env,
        gitRunner: shell.git,
        readStdin: async () => shell.stdin,
        promptPassword: async (question) => {
          shell.prompts.push(question);
          const answer = shell.answers.shift();
          if (answer === undefined) {
            throw new Error(`Unexpected prompt: ${question}`);
          }
          return answer;
        },
      };
      const code = await runCli(argv, io);
      return { code, stdout: stdout.text(), stderr: stderr.text() };
    },
  };
  return shell;
}
