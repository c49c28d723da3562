/**
 * Git recording of shrine changes
 *
 * Runs after the shrine file is persisted. Every failure is turned into a
 * warning; the persisted file stays as written.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { COMMIT_MESSAGES, createConsoleLogger, resolveGitSettings } from '@shrine/ipc';
import type { Logger, ShrineConfig } from '@shrine/ipc';
import { errorMessage, isNotFound } from '../fs/atomic.js';
import { currentIdentity } from '../identity.js';
import { ExecGitRunner } from './git-runner.js';
import type { GitRunner } from './git-runner.js';
import type { ChangeKind, RecordResult, VersionControl } from './types.js';

export interface GitVersionControlOptions {
  runner?: GitRunner;
  logger?: Logger;
}

export class GitVersionControl implements VersionControl {
  private readonly runner: GitRunner;
  private readonly logger: Logger;

  constructor(options: GitVersionControlOptions = {}) {
    this.runner = options.runner ?? new ExecGitRunner();
    this.logger = options.logger ?? createConsoleLogger();
  }

  async record(kind: ChangeKind, shrinePath: string, config: ShrineConfig): Promise<RecordResult> {
    const result: RecordResult = { staged: false, committed: false, pushed: false, warnings: [] };
    const settings = resolveGitSettings(config);
    if (!settings.enabled) return result;

    const folder = path.dirname(shrinePath);
    const file = path.basename(shrinePath);

    try {
      await this.ensureRepository(folder);
      await this.runner.run(['add', '--', file], folder);
      result.staged = true;

      if (!settings.commitAuto) return result;

      const message = kind === 'init' ? COMMIT_MESSAGES.INIT : COMMIT_MESSAGES.UPDATE;
      const { username, label } = currentIdentity();
      await this.runner.run(
        ['-c', `user.name=${username}`, '-c', `user.email=${label}`, 'commit', '--quiet', '-m', message, '--', file],
        folder,
      );
      result.committed = true;
      this.logger.debug(`Committed "${message}"`, { folder });

      if (!settings.pushAuto) return result;

      await this.runner.run(['push', '--quiet'], folder);
      result.pushed = true;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(message, { folder });
      result.warnings.push(message);
    }

    return result;
  }

  private async ensureRepository(folder: string): Promise<void> {
    try {
      await fs.stat(path.join(folder, '.git'));
    } catch (error) {
      if (!isNotFound(error)) throw error;
      await this.runner.run(['init', '--quiet'], folder);
      this.logger.info('Initialized git repository', { folder });
    }
  }
}
