/**
 * config command
 *
 * Reads and writes the options stored inside the encrypted shrine.
 */

import { Command } from 'commander';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

export function createConfigCommand(io: CliEnvironment): Command {
  const cmd = new Command('config').description('Read or change shrine options');

  cmd
    .command('get')
    .description('Print one option, or all of them')
    .argument('[key]', 'Option name, e.g. git.commit.auto')
    .action(async (key: string | undefined, _options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const config = await ctx.repository.getConfig(await ctx.keySource(), key);

      if (key !== undefined) {
        ctx.print(String(config[key]));
        return;
      }
      for (const name of Object.keys(config).sort()) {
        ctx.print(`${name}=${String(config[name])}`);
      }
    });

  cmd
    .command('set')
    .description('Change an option')
    .argument('<key>', 'Option name')
    .argument('<value>', 'New value; true and false are stored as booleans')
    .action(async (key: string, value: string, _options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const result = await ctx.repository.setConfig(await ctx.keySource(), key, value);
      ctx.printWarnings(result.warnings);
    });

  return cmd;
}
