/**
 * init command
 */

import { Command, Option } from 'commander';
import { ENCRYPTION_ALGORITHMS } from '@shrine/storage';
import type { EncryptionAlgorithm } from '@shrine/storage';
import { lockRunningAgent } from '../access/index.js';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

interface InitOptions {
  force?: boolean;
  git?: boolean;
  encryption: EncryptionAlgorithm;
}

export function createInitCommand(io: CliEnvironment): Command {
  return new Command('init')
    .description('Create an empty shrine')
    .option('-f, --force', 'Overwrite an existing shrine')
    .option('--git', 'Record every change in a git repository in the shrine folder')
    .addOption(
      new Option('-e, --encryption <algorithm>', 'Payload cipher').choices(ENCRYPTION_ALGORITHMS).default('aes-256-gcm'),
    )
    .action(async (options: InitOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const password =
        options.encryption === 'none'
          ? undefined
          : await ctx.newPassword(ctx.hasGivenPassword ? await ctx.password() : undefined);

      const result = await ctx.repository.init({
        password,
        encryption: options.encryption,
        force: options.force ?? false,
        git: options.git ?? false,
        iterations: ctx.settings.kdfIterations,
      });
      if (options.force) {
        await lockRunningAgent(ctx);
      }
      ctx.printWarnings(result.warnings);
    });
}
