/**
 * ls command
 */

import { Command } from 'commander';
import { withShrineAccess } from '../access/index.js';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';
import { formatList } from '../utils/format.js';

export function createLsCommand(io: CliEnvironment): Command {
  return new Command('ls')
    .description('List secrets whose path matches a regular expression')
    .argument('[pattern]', 'Regular expression tested against each path')
    .action(async (pattern: string | undefined, _options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const result = await withShrineAccess(ctx, (access) => access.list(pattern));
      for (const line of formatList(result)) {
        ctx.print(line);
      }
    });
}
