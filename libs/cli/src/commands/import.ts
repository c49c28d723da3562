/**
 * import command
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import { NotFoundError } from '@shrine/ipc';
import { isNotFound, toIoError } from '@shrine/storage';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

interface ImportOptions {
  prefix: string;
}

export function createImportCommand(io: CliEnvironment): Command {
  return new Command('import')
    .description('Store every KEY=value line of a file as a secret')
    .argument('<file>', 'File to import, one KEY=value per line')
    .option('--prefix <prefix>', 'Prepended to every imported key', '')
    .action(async (file: string, options: ImportOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const source = path.resolve(io.cwd, file);

      let content: string;
      try {
        content = await fs.readFile(source, 'utf8');
      } catch (error) {
        if (isNotFound(error)) {
          throw new NotFoundError(`No such file: ${source}`);
        }
        throw toIoError(error, 'read', source);
      }

      const result = await ctx.repository.import(await ctx.keySource(), { content, prefix: options.prefix });
      ctx.printWarnings(result.warnings);
      ctx.print(`imported ${result.imported}`);
    });
}
