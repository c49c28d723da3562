/**
 * info command
 */

import { Command, Option } from 'commander';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';
import { INFO_FIELDS, formatInfo, formatInfoField, isInfoField } from '../utils/format.js';

interface InfoOptions {
  field?: string;
}

export function createInfoCommand(io: CliEnvironment): Command {
  return new Command('info')
    .description('Show the shrine header; no password needed')
    .addOption(new Option('--field <field>', 'Print a single field').choices(INFO_FIELDS))
    .action(async (options: InfoOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const info = await ctx.repository.info();

      if (options.field !== undefined && isInfoField(options.field)) {
        ctx.print(formatInfoField(info, options.field));
        return;
      }
      for (const line of formatInfo(info)) {
        ctx.print(line);
      }
    });
}
