/**
 * dump command
 */

import { Command } from 'commander';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

export function createDumpCommand(io: CliEnvironment): Command {
  return new Command('dump')
    .description('Print path=value for every secret matching a pattern')
    .argument('[pattern]', 'Regular expression tested against each path')
    .action(async (pattern: string | undefined, _options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const entries = await ctx.repository.dump(await ctx.keySource(), pattern);
      try {
        for (const entry of entries) {
          ctx.print(`${entry.path}=${entry.value.toUtf8()}`);
        }
      } finally {
        for (const entry of entries) {
          entry.value.wipe();
        }
      }
    });
}
