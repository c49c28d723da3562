/**
 * convert command
 */

import { Command, Option } from 'commander';
import { ENCRYPTION_ALGORITHMS, convert } from '@shrine/storage';
import type { EncryptionAlgorithm } from '@shrine/storage';
import { lockRunningAgent } from '../access/index.js';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

interface ConvertOptions {
  newPassword?: string;
  encryption?: EncryptionAlgorithm;
}

export function createConvertCommand(io: CliEnvironment): Command {
  return new Command('convert')
    .description('Re-encrypt the shrine under a new password or cipher')
    .option('--new-password <password>', 'New password; asked for when omitted')
    .addOption(
      new Option('-e, --encryption <algorithm>', 'Cipher to switch to (default: keep the current one)').choices(
        ENCRYPTION_ALGORITHMS,
      ),
    )
    .action(async (options: ConvertOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const current = await ctx.repository.info();
      const encryption = options.encryption ?? current.encryption;

      if (current.encryption !== 'none') {
        // current password first, then the new one
        await ctx.password();
      }
      const oldKeys = await ctx.keySource();
      const newPassword =
        encryption === 'none' ? undefined : await ctx.newPassword(options.newPassword, 'New password');

      const result = await convert(ctx.repository, oldKeys, newPassword, {
        encryption,
        iterations: current.iterations ?? ctx.settings.kdfIterations,
      });
      await lockRunningAgent(ctx);
      ctx.printWarnings(result.warnings);
    });
}
