/**
 * rm command
 */

import { Command } from 'commander';
import { withShrineAccess } from '../access/index.js';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

export function createRmCommand(io: CliEnvironment): Command {
  return new Command('rm')
    .description('Remove a secret')
    .argument('<path>', 'Secret path')
    .action(async (secretPath: string, _options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const result = await withShrineAccess(ctx, (access) => access.remove(secretPath));
      ctx.printWarnings(result.warnings);
    });
}
