/**
 * Command context
 *
 * Everything a command needs beyond its own arguments: where the shrine is,
 * how to get the password, the repository, the agent client, and the
 * streams to write to. Tests build one with in-memory streams.
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod';
import {
  SHRINE_FILENAME,
  ValidationError,
  createConsoleLogger,
  loadShrineEnv,
} from '@shrine/ipc';
import type { Logger, ShrineEnv } from '@shrine/ipc';
import { GitVersionControl, PasswordKeySource, ShrineRepository, wipeKey } from '@shrine/storage';
import type { GitRunner, KeySource } from '@shrine/storage';
import { AgentClient, getRuntimeDir, getSocketPath } from '@shrine/agent';
import { promptHidden, readStdin } from './utils/prompt.js';

export interface OutputStream {
  write(chunk: string | Uint8Array): unknown;
  isTTY?: boolean;
}

export interface CliEnvironment {
  stdout: OutputStream;
  stderr: OutputStream;
  cwd: string;
  env: NodeJS.ProcessEnv;
  promptPassword(question: string): Promise<string>;
  readStdin(): Promise<Buffer>;
  /** Git runner for version control; defaults to the `git` executable */
  gitRunner?: GitRunner;
}

export function processEnvironment(): CliEnvironment {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
    promptPassword: (question) => promptHidden(question),
    readStdin: () => readStdin(),
  };
}

const GlobalOptionsSchema = z.object({
  password: z.string().optional(),
  path: z.string().optional(),
  folder: z.string().optional(),
});

export class CliContext {
  readonly shrinePath: string;
  readonly settings: ShrineEnv;
  readonly logger: Logger;
  private readonly givenPassword?: string;
  private cachedPassword?: Promise<string>;
  private cachedRepository?: ShrineRepository;

  constructor(
    readonly io: CliEnvironment,
    options: z.input<typeof GlobalOptionsSchema>,
  ) {
    const folder = options.path ?? options.folder ?? io.cwd;
    this.shrinePath = path.join(path.resolve(io.cwd, folder), SHRINE_FILENAME);
    this.settings = loadShrineEnv(io.env);
    this.logger = createConsoleLogger(this.settings.logLevel);
    this.givenPassword = options.password;
  }

  /**
   * Build the context from the global options of the invoked command.
   */
  static fromCommand(command: Command, io: CliEnvironment): CliContext {
    const parsed = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
    if (!parsed.success) {
      throw new ValidationError(`Invalid options: ${parsed.error.message}`, parsed.error.issues);
    }
    return new CliContext(io, parsed.data);
  }

  get repository(): ShrineRepository {
    if (!this.cachedRepository) {
      this.cachedRepository = new ShrineRepository({
        shrinePath: this.shrinePath,
        // git failures come back as warnings and are printed once by the command
        vcs: new GitVersionControl({
          runner: this.io.gitRunner,
          logger: createConsoleLogger(this.settings.logLevel === 'warn' ? 'error' : this.settings.logLevel),
        }),
        logger: this.logger,
        lockTimeoutMs: this.settings.lockTimeoutMs,
        kdfIterations: this.settings.kdfIterations,
      });
    }
    return this.cachedRepository;
  }

  get hasGivenPassword(): boolean {
    return this.givenPassword !== undefined;
  }

  /**
   * `--password`, or asked once per invocation.
   */
  password(): Promise<string> {
    if (this.givenPassword !== undefined) {
      return Promise.resolve(this.givenPassword);
    }
    this.cachedPassword ??= this.io.promptPassword('Password: ');
    return this.cachedPassword;
  }

  /**
   * Ask for a new password twice. `given` skips the prompt.
   */
  async newPassword(given?: string, label = 'Password'): Promise<string> {
    if (given !== undefined) return given;
    const first = await this.io.promptPassword(`${label}: `);
    const second = await this.io.promptPassword(`Confirm ${label.toLowerCase()}: `);
    if (first !== second) {
      throw new ValidationError('Passwords do not match');
    }
    return first;
  }

  /**
   * Asks for the password only when an encrypted shrine needs a key.
   */
  async keySource(): Promise<KeySource> {
    return {
      keyFor: async (header) => new PasswordKeySource(await this.password()).keyFor(header),
      release: (key) => wipeKey(key),
    };
  }

  agentClient(timeout?: number): AgentClient {
    const runtimeDir = getRuntimeDir(this.settings, this.io.env);
    return new AgentClient({ socketPath: getSocketPath(runtimeDir, this.shrinePath), timeout });
  }

  print(line: string): void {
    this.io.stdout.write(`${line}\n`);
  }

  printWarnings(warnings: readonly string[]): void {
    for (const warning of warnings) {
      this.io.stderr.write(`warning: ${warning}\n`);
    }
  }
}
